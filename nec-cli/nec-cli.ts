#!/usr/bin/env node
import { Option, program } from "commander";
import { DisplayConnection, DEFAULT_TIMEOUT_MS, sendRequests } from "./connection.js";
import { getErrorMessage } from "./errors.js";
import {
  DEFAULT_ADDRESS,
  DEFAULT_PORT,
  POWER_STATES,
  buildRequests,
  describeRequest,
  parseBacklight,
  parsePort,
  parseTimeout,
  type PowerState,
} from "./lib.js";
import { encodeFrame, formatHex, getCommand } from "./protocol/index.js";

interface CliOptions {
  address?: string;
  port: number;
  power?: PowerState;
  backlight?: number;
  timeout: number;
  dryRun?: boolean;
  verbose?: boolean;
}

program
  .name("nec-cli")
  .description("Control NEC displays over the network")
  .version("1.0.0")
  .argument("[address]", "Address to connect to")
  .option("-a, --address <host>", "Address to connect to")
  .option("--port <n>", "Port to connect to", parsePort, DEFAULT_PORT)
  .addOption(new Option("-p, --power <state>", "Set power to on or off").choices(POWER_STATES))
  .option("-b, --backlight <level>", "Set backlight to a specific value (0-100)", parseBacklight)
  .option("-t, --timeout <ms>", "Connect and reply timeout in milliseconds", parseTimeout, DEFAULT_TIMEOUT_MS)
  .option("-d, --dry-run", "Print the frames without connecting")
  .option("-v, --verbose", "Speak more to me")
  .action(async (positional: string | undefined, options: CliOptions) => {
    const host = options.address ?? positional ?? DEFAULT_ADDRESS;
    const requests = buildRequests(options);

    if (options.dryRun) {
      for (const request of requests) {
        const frame = encodeFrame(getCommand(request.command), request.value);
        console.log(`${describeRequest(request)}: ${formatHex(frame)}`);
      }
      return;
    }

    if (options.verbose) console.log(`Connecting to ${host}:${options.port}...`);

    let connection: DisplayConnection;
    try {
      connection = await DisplayConnection.connect({ host, port: options.port, timeout: options.timeout });
    } catch (err) {
      console.error(`Not able to set the parameter: "${getErrorMessage(err)}"`);
      process.exit(1);
    }

    if (options.verbose) console.log("Connected.");

    try {
      await sendRequests(connection, requests, { timeout: options.timeout, debug: options.verbose });
    } catch (err) {
      console.error(`Not able to set the parameter: "${getErrorMessage(err)}"`);
      process.exitCode = 1;
    } finally {
      connection.close();
    }
  });

await program.parseAsync();
