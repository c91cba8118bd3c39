/**
 * Error kinds raised by the NEC control client.
 */

export class NecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NecError";
  }
}

/** Address resolution or socket setup failed. */
export class ConnectionError extends NecError {
  constructor(message: string) {
    super(message);
    this.name = "ConnectionError";
  }
}

/** Write or read failed, including read timeout and peer close. */
export class IOError extends NecError {
  constructor(message: string) {
    super(message);
    this.name = "IOError";
  }
}

/** A value or payload does not fit the frame format. */
export class EncodingError extends NecError {
  constructor(message: string) {
    super(message);
    this.name = "EncodingError";
  }
}

export type ProtocolErrorReason = "Malformed" | "ChecksumMismatch";

/** A received frame failed structural or integrity validation. */
export abstract class ProtocolError extends NecError {
  abstract readonly reason: ProtocolErrorReason;
}

export class MalformedFrameError extends ProtocolError {
  readonly reason = "Malformed";

  constructor(message: string) {
    super(message);
    this.name = "MalformedFrameError";
  }
}

export class ChecksumMismatchError extends ProtocolError {
  readonly reason = "ChecksumMismatch";

  constructor(
    readonly expected: number,
    readonly received: number
  ) {
    super(`Checksum mismatch: expected 0x${toHexByte(expected)}, received 0x${toHexByte(received)}`);
    this.name = "ChecksumMismatchError";
  }
}

function toHexByte(value: number): string {
  return value.toString(16).padStart(2, "0");
}

/**
 * Extract error message from unknown error type.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
