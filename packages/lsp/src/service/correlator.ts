import { DebugLogger } from '../debug/debug-logger.js';
import { RequestTimeoutError } from '../errors.js';
import type { JsonRpcResponse } from '../types.js';

interface PendingRequest {
  method: string;
  resolve: (response: JsonRpcResponse) => void;
  reject: (reason: Error) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

export interface RegisteredRequest {
  id: number;
  response: Promise<JsonRpcResponse>;
}

const logger = DebugLogger.getLogger('correlator');

/**
 * Matches responses to requests by id. Ids start at 1 and are never reused
 * for the lifetime of the correlator. Every entry leaves the map exactly
 * once: on its response, on timeout/abandon, or on {@link drainAll}.
 */
export class ResponseCorrelator {
  private readonly pending = new Map<number, PendingRequest>();
  private nextId = 1;

  get size(): number {
    return this.pending.size;
  }

  has(id: number): boolean {
    return this.pending.has(id);
  }

  /**
   * Allocates an id and a waiter. With a positive `timeoutMs` the waiter
   * rejects with {@link RequestTimeoutError} and the entry is dropped once
   * the window elapses.
   */
  register(method: string, timeoutMs?: number): RegisteredRequest {
    const id = this.nextId;
    this.nextId += 1;

    const response = new Promise<JsonRpcResponse>((resolve, reject) => {
      const entry: PendingRequest = { method, resolve, reject, timer: null };
      if (timeoutMs !== undefined && timeoutMs > 0) {
        entry.timer = setTimeout(() => {
          if (this.pending.get(id) !== entry) {
            return;
          }
          this.pending.delete(id);
          logger.debug(() => `request ${id} '${method}' timed out`);
          reject(new RequestTimeoutError(method, timeoutMs));
        }, timeoutMs);
      }
      this.pending.set(id, entry);
    });

    return { id, response };
  }

  /**
   * Hands `response` to its waiter. Returns false, and drops the response,
   * when nothing is waiting for that id.
   */
  resolve(response: JsonRpcResponse): boolean {
    const id = response.id;
    const entry = typeof id === 'number' ? this.pending.get(id) : undefined;
    if (typeof id !== 'number' || !entry) {
      logger.warn(`received response for unknown request id ${String(id)}`);
      return false;
    }

    this.pending.delete(id);
    clearPendingTimer(entry);
    logger.debug(() => `response for request ${id} '${entry.method}'`);
    entry.resolve(response);
    return true;
  }

  /**
   * Removes the entry without settling its waiter.
   */
  abandon(id: number): boolean {
    const entry = this.pending.get(id);
    if (!entry) {
      return false;
    }
    this.pending.delete(id);
    clearPendingTimer(entry);
    return true;
  }

  /**
   * Fails every outstanding waiter with `error` and empties the map.
   * Returns how many were pending.
   */
  drainAll(error: Error): number {
    const entries = [...this.pending.values()];
    this.pending.clear();
    for (const entry of entries) {
      clearPendingTimer(entry);
      entry.reject(error);
    }
    return entries.length;
  }
}

function clearPendingTimer(entry: PendingRequest): void {
  if (entry.timer !== null) {
    clearTimeout(entry.timer);
    entry.timer = null;
  }
}
