/**
 * Protocol types for NEC display communication.
 */

import type { ProtocolError } from "../errors.js";

/** Message type byte (case sensitive) */
export const MessageKind = {
  Command: 0x41, // 'A'
  CommandReply: 0x42, // 'B'
  GetParameter: 0x43, // 'C'
  GetParameterReply: 0x44, // 'D'
  SetParameter: 0x45, // 'E'
  SetParameterReply: 0x46, // 'F'
} as const;

export type MessageKind = (typeof MessageKind)[keyof typeof MessageKind];

/** Logical operations supported by the command table */
export type CommandName = "power" | "backlight";

/** Message kind plus the fixed bytes naming the command or parameter */
export interface CommandDescriptor {
  readonly kind: MessageKind;
  readonly prefix: readonly number[];
}

/** A command with the parameter value to send */
export interface CommandRequest {
  command: CommandName;
  value: number;
}

/** Structurally valid frame received from a display */
export interface ParsedReply {
  /** Message type byte; not restricted to known kinds */
  kind: number;
  destination: number;
  source: number;
  /** Declared message length (STX through ETX) */
  length: number;
  /** Bytes between STX and ETX */
  payload: Uint8Array;
}

export type ValidationResult = { ok: true; reply: ParsedReply } | { ok: false; error: ProtocolError };
