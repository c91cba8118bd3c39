/**
 * Command table: payload prefixes from the display's external control documentation.
 */

import { MessageKind, type CommandDescriptor, type CommandName } from "./types.js";

export const POWER_ON = 1;
export const POWER_OFF = 4;

export const BACKLIGHT_MIN = 0;
export const BACKLIGHT_MAX = 100;

export const COMMANDS: Readonly<Record<CommandName, CommandDescriptor>> = Object.freeze({
  power: Object.freeze({ kind: MessageKind.Command, prefix: Object.freeze([0x43, 0x32, 0x30, 0x33, 0x44, 0x36]) }), // "C203D6"
  backlight: Object.freeze({ kind: MessageKind.SetParameter, prefix: Object.freeze([0x30, 0x30, 0x31, 0x30]) }), // "0010"
});

const REPLY_KINDS: Partial<Record<number, MessageKind>> = {
  [MessageKind.Command]: MessageKind.CommandReply,
  [MessageKind.GetParameter]: MessageKind.GetParameterReply,
  [MessageKind.SetParameter]: MessageKind.SetParameterReply,
};

export function getCommand(name: CommandName): CommandDescriptor {
  return COMMANDS[name];
}

/**
 * Message kind a display answers a request of the given kind with.
 * Returns undefined for kinds that are themselves replies.
 */
export function replyKindFor(kind: number): MessageKind | undefined {
  return REPLY_KINDS[kind];
}

/** Printable name of a message type byte, e.g. "CommandReply" or "0x5a". */
export function describeKind(kind: number): string {
  for (const [name, value] of Object.entries(MessageKind)) {
    if (value === kind) return name;
  }
  return `0x${kind.toString(16).padStart(2, "0")}`;
}
