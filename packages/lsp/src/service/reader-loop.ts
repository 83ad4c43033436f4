import type { Readable } from 'node:stream';

import { DebugLogger } from '../debug/debug-logger.js';
import { FramingError } from '../errors.js';
import type {
  JsonRpcErrorObject,
  JsonRpcId,
  JsonRpcRequest,
  JsonRpcResponse,
} from '../types.js';
import { FrameDecoder, isRecord } from './framing.js';

export interface ReaderLoopHandlers {
  onResponse(response: JsonRpcResponse): void;
  onServerRequest(request: JsonRpcRequest): void;
}

export interface ReaderLoopOptions {
  maxMessageBytes: number;
}

const logger = DebugLogger.getLogger('reader');

const isJsonRpcId = (value: unknown): value is JsonRpcId =>
  typeof value === 'number' || typeof value === 'string';

const toErrorObject = (value: unknown): JsonRpcErrorObject | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  return {
    code: typeof value.code === 'number' ? value.code : 0,
    message:
      typeof value.message === 'string' ? value.message : JSON.stringify(value),
    ...('data' in value ? { data: value.data } : {}),
  };
};

/**
 * Routes one decoded message. Messages with an id and no method are
 * responses; with both they are requests from the server; with a method
 * only they are notifications, which are logged and dropped. Bodies that
 * are not JSON objects are dropped too.
 */
export function dispatchMessage(
  message: unknown,
  handlers: ReaderLoopHandlers,
): void {
  if (!isRecord(message)) {
    logger.warn(() => `dropping non-object message: ${JSON.stringify(message)}`);
    return;
  }
  const { id, method } = message;

  if (typeof method === 'string') {
    if (isJsonRpcId(id)) {
      handlers.onServerRequest({
        jsonrpc: '2.0',
        id,
        method,
        ...('params' in message ? { params: message.params } : {}),
      });
      return;
    }
    logger.debug(() => `LSP notification: ${method}`);
    return;
  }

  if (isJsonRpcId(id) || id === null) {
    const error = toErrorObject(message.error);
    handlers.onResponse({
      jsonrpc: '2.0',
      id,
      ...('result' in message ? { result: message.result } : {}),
      ...(error ? { error } : {}),
    });
    return;
  }

  logger.warn('dropping message with neither id nor method');
}

/**
 * Drains `input` until end of stream. Resolves on an orderly close;
 * rejects with the first framing or I/O error.
 */
export async function runReaderLoop(
  input: Readable,
  handlers: ReaderLoopHandlers,
  options: ReaderLoopOptions,
): Promise<void> {
  const decoder = new FrameDecoder({
    maxMessageBytes: options.maxMessageBytes,
  });

  for await (const chunk of input) {
    const bytes: Buffer = Buffer.isBuffer(chunk)
      ? chunk
      : Buffer.from(String(chunk), 'utf8');
    decoder.feed(bytes, (message) => {
      dispatchMessage(message, handlers);
    });
  }

  if (decoder.isAwaitingBody) {
    throw new FramingError('LSP stdout closed in the middle of a message');
  }
  logger.info('LSP stdout closed');
}
