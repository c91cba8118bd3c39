/**
 * NEC display connection abstraction.
 */

import * as net from "net";
import type { Duplex } from "stream";
import { ConnectionError, EncodingError, IOError, MalformedFrameError } from "./errors.js";
import {
  BACKLIGHT_MAX,
  BACKLIGHT_MIN,
  POWER_OFF,
  POWER_ON,
  describeKind,
  encodeFrame,
  scanFrame,
  formatHex,
  getCommand,
  parseReply,
  replyKindFor,
  type CommandName,
  type CommandRequest,
  type ParsedReply,
} from "./protocol/index.js";

export const DEFAULT_TIMEOUT_MS = 2000;
/** Receive buffer size; a reply that does not fit is rejected */
export const MAX_REPLY_LENGTH = 64;

export interface ConnectOptions {
  host: string;
  port: number;
  /** Connect and read timeout in milliseconds */
  timeout?: number;
}

/** Options for a single command exchange */
export interface SendOptions {
  timeout: number;
  maxLength: number;
  debug?: boolean;
}

/**
 * Encapsulates a TCP session with one display. Commands are strictly
 * sequential: the protocol carries no request id to match replies.
 */
export class DisplayConnection {
  private received: Buffer = Buffer.alloc(0);
  private failure: IOError | null = null;
  private notify: (() => void) | null = null;
  private busy = false;

  constructor(
    private readonly socket: Duplex,
    private readonly timeout: number = DEFAULT_TIMEOUT_MS
  ) {
    socket.on("data", (data: Buffer) => {
      this.received = Buffer.concat([this.received, data]);
      this.notify?.();
    });
    socket.on("error", (err: Error) => {
      this.failure = new IOError(`Socket error: ${err.message}`);
      this.notify?.();
    });
    socket.on("end", () => this.fail("Connection closed by display"));
    socket.on("close", () => this.fail("Connection closed"));
  }

  /**
   * Open a TCP connection to a display.
   */
  static async connect(options: ConnectOptions): Promise<DisplayConnection> {
    const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    const socket = await openSocket(options.host, options.port, timeout);
    return new DisplayConnection(socket, timeout);
  }

  /**
   * Close the connection.
   */
  close(): void {
    this.socket.destroy();
  }

  /**
   * Write raw bytes, resolving once they are handed to the socket.
   */
  write(bytes: Uint8Array): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);

    return new Promise((resolve, reject) => {
      this.socket.write(bytes, (err) => {
        if (err) {
          reject(new IOError(`Cannot write to socket: ${err.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Wait for one complete frame.
   * @param maxLength - Largest frame accepted, and bytes to buffer before giving up
   * @param timeout - Milliseconds to wait for the frame to complete
   */
  read(maxLength: number = MAX_REPLY_LENGTH, timeout: number = this.timeout): Promise<Uint8Array> {
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timeoutId);
        this.notify = null;
      };

      const check = () => {
        const scan = scanFrame(this.received, maxLength);
        if (scan.status === "complete") {
          cleanup();
          this.received = this.received.subarray(scan.end);
          resolve(scan.frame);
        } else if (scan.status === "invalid") {
          cleanup();
          reject(new MalformedFrameError(scan.reason));
        } else if (this.received.length >= maxLength) {
          cleanup();
          reject(new MalformedFrameError(`No complete frame in ${this.received.length} received bytes`));
        } else if (this.failure) {
          cleanup();
          reject(this.failure);
        }
      };

      const timeoutId = setTimeout(() => {
        cleanup();
        reject(new IOError(`No reply from display within ${timeout} ms`));
      }, timeout);

      this.notify = check;
      check();
    });
  }

  /**
   * Encode a command, send it and wait for a valid reply frame.
   */
  async sendCommand(command: CommandName, value: number, options: Partial<SendOptions> = {}): Promise<ParsedReply> {
    const { timeout = this.timeout, maxLength = MAX_REPLY_LENGTH, debug = false } = options;

    if (this.busy) {
      throw new IOError("Previous command is still waiting for its reply");
    }
    this.busy = true;

    try {
      const frame = encodeFrame(getCommand(command), value);

      if (debug) {
        console.log(`  [DEBUG] Sending ${frame.length} bytes: ${formatHex(frame)}`);
      }

      // Anything left over belongs to an earlier exchange
      this.received = Buffer.alloc(0);
      await this.write(frame);
      const raw = await this.read(maxLength, timeout);

      if (debug) {
        console.log(`  [DEBUG] Received ${raw.length} bytes: ${formatHex(raw)}`);
      }

      return parseReply(raw);
    } finally {
      this.busy = false;
    }
  }

  /**
   * Switch the display on or off.
   */
  async setPower(on: boolean, options: Partial<SendOptions> = {}): Promise<ParsedReply> {
    return this.sendCommand("power", on ? POWER_ON : POWER_OFF, options);
  }

  /**
   * Set the backlight level (0-100).
   */
  async setBacklight(level: number, options: Partial<SendOptions> = {}): Promise<ParsedReply> {
    if (!Number.isInteger(level) || level < BACKLIGHT_MIN || level > BACKLIGHT_MAX) {
      throw new EncodingError(`Invalid backlight: ${level}. Must be ${BACKLIGHT_MIN}-${BACKLIGHT_MAX}.`);
    }
    return this.sendCommand("backlight", level, options);
  }

  private fail(message: string): void {
    this.failure ??= new IOError(message);
    this.notify?.();
  }
}

/**
 * Send requests one after another, each waiting for its reply.
 */
export async function sendRequests(
  connection: DisplayConnection,
  requests: CommandRequest[],
  options: Partial<SendOptions> = {}
): Promise<ParsedReply[]> {
  const replies: ParsedReply[] = [];

  for (const request of requests) {
    const reply = await connection.sendCommand(request.command, request.value, options);
    replies.push(reply);

    if (options.debug) {
      const expected = replyKindFor(getCommand(request.command).kind);
      const note = expected !== undefined && reply.kind !== expected ? ` (expected ${describeKind(expected)})` : "";
      console.log(`  Reply to ${request.command}: ${describeKind(reply.kind)}${note}, payload ${formatHex(reply.payload)}`);
    }
  }

  return replies;
}

/**
 * Open a TCP socket, failing with ConnectionError on refusal or timeout.
 */
async function openSocket(host: string, port: number, timeout: number): Promise<net.Socket> {
  const socket = net.createConnection({ host, port });

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      clearTimeout(timeoutId);
      socket.destroy();
      reject(new ConnectionError(`Cannot connect to ${host}:${port}: ${err.message}`));
    };

    const timeoutId = setTimeout(() => {
      socket.removeListener("error", onError);
      socket.destroy();
      reject(new ConnectionError(`Cannot connect to ${host}:${port}: timed out after ${timeout} ms`));
    }, timeout);

    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timeoutId);
      socket.removeListener("error", onError);
      resolve();
    });
  });

  return socket;
}
