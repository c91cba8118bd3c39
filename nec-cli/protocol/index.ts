/**
 * NEC protocol module - frame encoding, validation and the command table.
 */

export { MessageKind } from "./types.js";
export type { FrameScan } from "./frame.js";
export type { CommandDescriptor, CommandName, CommandRequest, ParsedReply, ValidationResult } from "./types.js";
export {
  FRAME,
  MIN_FRAME_SIZE,
  encodeFrame,
  encodeLength,
  decodeLength,
  encodeValue,
  blockCheck,
  validateFrame,
  parseReply,
  scanFrame,
  formatHex,
} from "./frame.js";
export {
  COMMANDS,
  POWER_ON,
  POWER_OFF,
  BACKLIGHT_MIN,
  BACKLIGHT_MAX,
  getCommand,
  replyKindFor,
  describeKind,
} from "./commands.js";
