import { InvalidArgumentError } from "commander";
import { BACKLIGHT_MAX, BACKLIGHT_MIN, POWER_OFF, POWER_ON, type CommandRequest } from "./protocol/index.js";

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_ADDRESS = "10.0.0.240";
export const DEFAULT_PORT = 7142;

export const POWER_STATES = ["on", "off"] as const;
export type PowerState = (typeof POWER_STATES)[number];

// =============================================================================
// Option Parsers
// =============================================================================

function parseInteger(value: string): number {
  return /^\s*-?\d+\s*$/.test(value) ? parseInt(value, 10) : NaN;
}

export function parsePowerState(state: string): number {
  switch (state) {
    case "on":
      return POWER_ON;
    case "off":
      return POWER_OFF;
    default:
      throw new InvalidArgumentError(`Invalid power state: ${state}. Must be on or off.`);
  }
}

export function parseBacklight(value: string): number {
  const level = parseInteger(value);
  if (isNaN(level) || level < BACKLIGHT_MIN || level > BACKLIGHT_MAX) {
    throw new InvalidArgumentError(`Invalid backlight: ${value}. Must be ${BACKLIGHT_MIN}-${BACKLIGHT_MAX}.`);
  }
  return level;
}

export function parsePort(value: string): number {
  const port = parseInteger(value);
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError(`Invalid port: ${value}. Must be 1-65535.`);
  }
  return port;
}

export function parseTimeout(value: string): number {
  const timeout = parseInteger(value);
  if (isNaN(timeout) || timeout <= 0) {
    throw new InvalidArgumentError(`Invalid timeout: ${value}. Must be a positive number of milliseconds.`);
  }
  return timeout;
}

// =============================================================================
// Requests
// =============================================================================

export interface RequestOptions {
  power?: PowerState;
  backlight?: number;
}

/**
 * Turn parsed CLI options into the ordered list of commands to send.
 * Power is always sent before backlight.
 */
export function buildRequests(options: RequestOptions): CommandRequest[] {
  const requests: CommandRequest[] = [];
  if (options.power !== undefined) {
    requests.push({ command: "power", value: parsePowerState(options.power) });
  }
  if (options.backlight !== undefined) {
    requests.push({ command: "backlight", value: options.backlight });
  }
  return requests;
}

export function describeRequest(request: CommandRequest): string {
  if (request.command === "power") {
    return `power ${request.value === POWER_ON ? "on" : "off"}`;
  }
  return `${request.command} ${request.value}`;
}
