/**
 * NEC frame encoding and reply validation.
 *
 * Frame layout:
 *
 *   SOH | reserved | destination | source | type | len(2) | STX | payload | ETX | BCC | CR
 *
 * The length field counts STX, payload and ETX as two ASCII hex digits.
 * BCC is the XOR of every byte from the reserved byte through ETX.
 */

import { ChecksumMismatchError, EncodingError, MalformedFrameError } from "../errors.js";
import type { CommandDescriptor, ParsedReply, ValidationResult } from "./types.js";

/** Protocol framing constants */
export const FRAME = {
  SOH: 0x01,
  RESERVED: 0x30, // '0'
  DESTINATION: 0x41, // 'A' == monitor ID 1
  SOURCE: 0x30, // '0' == controller
  STX: 0x02,
  ETX: 0x03,
  DELIMITER: 0x0d,
} as const;

/** SOH, reserved, destination, source, type, two length digits, STX */
const HEADER_SIZE = 8;

/** ETX, BCC and delimiter are the only bytes after the payload */
const TRAILER_SIZE = 3;

/** Smallest buffer that can hold a header and trailer */
export const MIN_FRAME_SIZE = 9;

/** Hex digits used for an integer parameter */
export const VALUE_DIGITS = 4;
const MAX_VALUE = 0xffff;

/** STX and ETX are counted in the length field */
const STX_ETX_SIZE = 2;

/** The leading length digit is always '0' when encoding */
const MAX_ENCODED_LENGTH = 0x0f;

const LENGTH_OFFSET = 5;
const STX_OFFSET = 7;

const ASCII_ZERO = 0x30;
/** Distance from ASCII '9' + 1 to 'A' */
const HEX_LETTER_GAP = 7;

/**
 * Encode a message length as the two-byte length field.
 * Lengths above 9 skip the gap between '9' and 'A' in ASCII.
 */
export function encodeLength(length: number): [number, number] {
  if (!Number.isInteger(length) || length < 0 || length > MAX_ENCODED_LENGTH) {
    throw new EncodingError(`payload too large: message length ${length} exceeds ${MAX_ENCODED_LENGTH}`);
  }
  const digit = length > 9 ? length + HEX_LETTER_GAP : length;
  return [ASCII_ZERO, ASCII_ZERO + digit];
}

/**
 * Decode the two-byte length field. Accepts the full two-digit range so
 * replies longer than a single digit still parse.
 */
export function decodeLength(high: number, low: number): number | null {
  const text = String.fromCharCode(high, low);
  if (!/^[0-9A-Fa-f]{2}$/.test(text)) return null;
  return parseInt(text, 16);
}

/**
 * Encode an integer parameter as four uppercase ASCII hex digits.
 */
export function encodeValue(value: number): number[] {
  if (!Number.isInteger(value) || value < 0 || value > MAX_VALUE) {
    throw new EncodingError(`Value ${value} out of range (0-${MAX_VALUE})`);
  }
  const text = value.toString(16).toUpperCase().padStart(VALUE_DIGITS, "0");
  return Array.from(text, (char) => char.charCodeAt(0));
}

/**
 * XOR of bytes[start..end], both inclusive.
 */
export function blockCheck(bytes: ArrayLike<number>, start: number, end: number): number {
  let check = 0;
  for (let i = start; i <= end; i++) {
    check ^= bytes[i];
  }
  return check;
}

/**
 * Build a complete frame for a command descriptor and parameter value.
 */
export function encodeFrame(descriptor: CommandDescriptor, value: number): Uint8Array {
  const length = descriptor.prefix.length + VALUE_DIGITS + STX_ETX_SIZE;
  const [lengthHigh, lengthLow] = encodeLength(length);
  const valueBytes = encodeValue(value);

  const bytes: number[] = [
    FRAME.SOH,
    FRAME.RESERVED,
    FRAME.DESTINATION,
    FRAME.SOURCE,
    descriptor.kind,
    lengthHigh,
    lengthLow,
    FRAME.STX,
    ...descriptor.prefix,
    ...valueBytes,
    FRAME.ETX,
  ];

  bytes.push(blockCheck(bytes, 1, bytes.length - 1));
  bytes.push(FRAME.DELIMITER);

  return Uint8Array.from(bytes);
}

/**
 * Check a received frame's structure and block check code.
 */
export function validateFrame(raw: Uint8Array): ValidationResult {
  const malformed = (message: string): ValidationResult => ({ ok: false, error: new MalformedFrameError(message) });

  if (raw.length < MIN_FRAME_SIZE) {
    return malformed(`Frame too short: ${raw.length} bytes, need at least ${MIN_FRAME_SIZE}`);
  }
  if (raw[0] !== FRAME.SOH) {
    return malformed("Missing start of header");
  }

  const length = decodeLength(raw[LENGTH_OFFSET], raw[LENGTH_OFFSET + 1]);
  if (length === null) {
    return malformed("Length field is not a hex number");
  }
  if (length < STX_ETX_SIZE) {
    return malformed(`Declared length ${length} cannot hold STX and ETX`);
  }

  const expectedSize = HEADER_SIZE - 1 + length + TRAILER_SIZE - 1;
  if (raw.length !== expectedSize) {
    return malformed(`Frame size ${raw.length} does not match declared length ${length} (expected ${expectedSize})`);
  }

  const etxOffset = STX_OFFSET + length - 1;
  if (raw[STX_OFFSET] !== FRAME.STX) {
    return malformed("Missing STX");
  }
  if (raw[etxOffset] !== FRAME.ETX) {
    return malformed("Missing ETX");
  }
  if (raw[etxOffset + 2] !== FRAME.DELIMITER) {
    return malformed("Missing delimiter");
  }

  const expected = blockCheck(raw, 1, etxOffset);
  const received = raw[etxOffset + 1];
  if (expected !== received) {
    return { ok: false, error: new ChecksumMismatchError(expected, received) };
  }

  const reply: ParsedReply = {
    kind: raw[4],
    destination: raw[2],
    source: raw[3],
    length,
    payload: raw.slice(STX_OFFSET + 1, etxOffset),
  };
  return { ok: true, reply };
}

/**
 * Validate a frame and throw its ProtocolError on failure.
 */
export function parseReply(raw: Uint8Array): ParsedReply {
  const result = validateFrame(raw);
  if (!result.ok) throw result.error;
  return result.reply;
}

/** Outcome of searching a receive buffer for a frame */
export type FrameScan =
  | { status: "complete"; frame: Uint8Array; end: number }
  | { status: "incomplete" }
  | { status: "invalid"; reason: string };

/**
 * Header problem that rules out a frame starting at `start`, or null when
 * the candidate may still be a frame.
 */
function checkHeader(buffer: Uint8Array, start: number, length: number, maxLength: number): string | null {
  if (length < STX_ETX_SIZE) return `Declared length ${length} cannot hold STX and ETX`;
  if (buffer[start + STX_OFFSET] !== FRAME.STX) return "Missing STX";
  if (MIN_FRAME_SIZE + length > maxLength) return `Declared length ${length} does not fit in ${maxLength} bytes`;
  return null;
}

/**
 * Search a receive buffer for one complete frame.
 *
 * Every SOH starts a candidate. A candidate whose header or fixed trailer
 * positions rule it out is skipped and the search resumes at the next SOH.
 * The result is "invalid" only when every candidate has been ruled out, and
 * "incomplete" while no SOH has arrived or a candidate still needs bytes.
 * The check byte is left to validateFrame.
 */
export function scanFrame(buffer: Uint8Array, maxLength: number = Number.POSITIVE_INFINITY): FrameScan {
  let waiting = false;
  let reason: string | null = null;

  for (let start = buffer.indexOf(FRAME.SOH); start !== -1; start = buffer.indexOf(FRAME.SOH, start + 1)) {
    if (buffer.length < start + HEADER_SIZE) {
      waiting = true;
      continue;
    }

    const length = decodeLength(buffer[start + LENGTH_OFFSET], buffer[start + LENGTH_OFFSET + 1]);
    if (length === null) {
      reason ??= "Length field is not a hex number";
      continue;
    }

    const problem = checkHeader(buffer, start, length, maxLength);
    if (problem !== null) {
      reason ??= problem;
      continue;
    }

    const end = start + MIN_FRAME_SIZE + length;
    if (buffer.length < end) {
      waiting = true;
      continue;
    }

    const etxOffset = start + STX_OFFSET + length - 1;
    if (buffer[etxOffset] !== FRAME.ETX) {
      reason ??= "Missing ETX";
      continue;
    }
    if (buffer[etxOffset + 2] !== FRAME.DELIMITER) {
      reason ??= "Missing delimiter";
      continue;
    }

    return { status: "complete", frame: buffer.slice(start, end), end };
  }

  if (waiting || reason === null) return { status: "incomplete" };
  return { status: "invalid", reason };
}

/**
 * Format bytes as space separated hex pairs.
 */
export function formatHex(bytes: ArrayLike<number>): string {
  return Array.from(bytes, (byte) => byte.toString(16).padStart(2, "0")).join(" ");
}
