/**
 * `Content-Length` framing for JSON-RPC over a byte stream:
 *
 * ```
 * Content-Length: <N>\r\n
 * \r\n
 * <N bytes of UTF-8 JSON>
 * ```
 */

import type { Writable } from 'node:stream';

import { FramingError } from '../errors.js';
import type { JsonRpcMessage } from '../types.js';

export type MessageSink = (message: unknown) => void;

export const MAX_HEADER_BYTES = 8 * 1024;

const NEWLINE = 0x0a;

/** Frames any JSON-serializable value. */
export function encodeFrame(value: unknown): Buffer {
  const json: string | undefined = JSON.stringify(value);
  if (json === undefined) {
    throw new TypeError(`cannot frame a value of type ${typeof value}`);
  }
  const body = Buffer.from(json, 'utf8');
  const header = Buffer.from(
    `Content-Length: ${body.length}\r\n\r\n`,
    'ascii',
  );
  return Buffer.concat([header, body]);
}

export interface FrameDecoderOptions {
  maxMessageBytes: number;
}

export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private bodyLength: number | null = null;

  constructor(private readonly options: FrameDecoderOptions) {}

  /**
   * Buffers `chunk` and hands each body it completes to `onMessage` as soon
   * as it is parsed, whatever JSON value it holds. Throws
   * {@link FramingError} on a bad header, an oversized declaration or a
   * body that is not JSON, after every earlier body has been delivered; the
   * decoder is unusable afterwards.
   */
  feed(chunk: Buffer, onMessage: MessageSink): void {
    this.buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    while (true) {
      if (this.bodyLength === null) {
        const length = this.readHeaders();
        if (length === null) {
          return;
        }
        this.bodyLength = length;
      }

      if (this.buffer.length < this.bodyLength) {
        return;
      }

      const body = this.buffer.subarray(0, this.bodyLength);
      this.buffer = this.buffer.subarray(this.bodyLength);
      this.bodyLength = null;
      onMessage(parseBody(body));
    }
  }

  /** True once a header block has been read but its body has not. */
  get isAwaitingBody(): boolean {
    return this.bodyLength !== null;
  }

  /**
   * Consumes a complete header block and returns the declared body length,
   * or `null` when the blank line has not arrived yet.
   */
  private readHeaders(): number | null {
    let cursor = 0;
    let contentLength: number | undefined;

    while (true) {
      const newline = this.buffer.indexOf(NEWLINE, cursor);
      if (newline < 0) {
        if (this.buffer.length > MAX_HEADER_BYTES) {
          throw new FramingError(
            `LSP header block exceeds ${MAX_HEADER_BYTES} bytes`,
          );
        }
        return null;
      }

      const line = this.buffer
        .subarray(cursor, newline)
        .toString('ascii')
        .trim();
      cursor = newline + 1;

      if (line.length === 0) {
        break;
      }

      const separator = line.indexOf(':');
      if (
        separator > 0 &&
        line.slice(0, separator).trim().toLowerCase() === 'content-length'
      ) {
        contentLength = parseContentLength(line.slice(separator + 1).trim());
      }
    }

    if (contentLength === undefined) {
      throw new FramingError('missing Content-Length header');
    }
    if (contentLength > this.options.maxMessageBytes) {
      throw new FramingError(
        `LSP message size ${contentLength} exceeds maximum of ${this.options.maxMessageBytes}`,
      );
    }

    this.buffer = this.buffer.subarray(cursor);
    return contentLength;
  }
}

function parseContentLength(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new FramingError(`invalid Content-Length: '${value}'`);
  }
  const length = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(length)) {
    throw new FramingError(`invalid Content-Length: '${value}'`);
  }
  return length;
}

function parseBody(body: Buffer): unknown {
  try {
    return JSON.parse(body.toString('utf8'));
  } catch (error) {
    throw new FramingError('invalid JSON-RPC message', { cause: error });
  }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Owns the sidecar's stdin. Each frame goes out in a single `write`, so
 * frames from concurrent callers stay contiguous on the pipe.
 */
export class FrameWriter {
  constructor(private readonly output: Writable) {}

  async write(message: JsonRpcMessage): Promise<void> {
    const frame = encodeFrame(message);
    await new Promise<void>((resolve, reject) => {
      this.output.write(frame, (error?: Error | null) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  end(): void {
    if (!this.output.writableEnded) {
      this.output.end();
    }
  }
}
