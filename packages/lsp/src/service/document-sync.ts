import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

import { DebugLogger } from '../debug/debug-logger.js';
import { detectLanguageId } from './language-map.js';
import { toFileUri } from './uri.js';

export interface OpenDocument {
  version: number;
  fingerprint: string;
}

export type SyncOutcome = 'opened' | 'changed' | 'unchanged';

/**
 * Where document notifications go; the session in production.
 */
export interface DocumentNotifier {
  notify(method: string, params: unknown): Promise<void>;
}

export type TextReader = (filePath: string) => Promise<string>;

const readUtf8: TextReader = (filePath) => readFile(filePath, 'utf8');

const logger = DebugLogger.getLogger('document-sync');

/** Content fingerprint used to tell whether a file changed since last sync. */
export function fingerprint(text: string): string {
  return createHash('md5').update(text, 'utf8').digest('hex');
}

/**
 * Keeps the server's view of each file current while sending as little as
 * possible: `didOpen` the first time, `didChange` with the whole text when
 * the content moved, nothing when it did not.
 */
export class DocumentSyncTracker {
  private readonly documents = new Map<string, OpenDocument>();
  private readonly locks = new Map<string, Promise<void>>();

  constructor(
    private readonly notifier: DocumentNotifier,
    private readonly readText: TextReader = readUtf8,
  ) {}

  get(filePath: string): Readonly<OpenDocument> | undefined {
    return this.documents.get(filePath);
  }

  get size(): number {
    return this.documents.size;
  }

  async ensureSynced(filePath: string): Promise<SyncOutcome> {
    const uri = toFileUri(filePath);
    return this.withPathLock(filePath, async () => {
      const text = await this.readText(filePath);
      const hash = fingerprint(text);
      const previous = this.documents.get(filePath);

      if (!previous) {
        this.documents.set(filePath, { version: 0, fingerprint: hash });
        await this.send(filePath, previous, 'textDocument/didOpen', {
          textDocument: {
            uri,
            languageId: detectLanguageId(filePath),
            version: 0,
            text,
          },
        });
        return 'opened';
      }

      if (previous.fingerprint === hash) {
        logger.debug(() => `${filePath} unchanged, skipping didChange`);
        return 'unchanged';
      }

      const version = previous.version + 1;
      this.documents.set(filePath, { version, fingerprint: hash });
      await this.send(filePath, previous, 'textDocument/didChange', {
        textDocument: { uri, version },
        contentChanges: [{ text }],
      });
      return 'changed';
    });
  }

  private async send(
    filePath: string,
    previous: OpenDocument | undefined,
    method: string,
    params: unknown,
  ): Promise<void> {
    try {
      await this.notifier.notify(method, params);
    } catch (error) {
      if (previous) {
        this.documents.set(filePath, previous);
      } else {
        this.documents.delete(filePath);
      }
      throw error;
    }
  }

  /**
   * Runs `task` after every earlier task for the same path has settled.
   */
  private async withPathLock<T>(
    filePath: string,
    task: () => Promise<T>,
  ): Promise<T> {
    const previous = this.locks.get(filePath) ?? Promise.resolve();
    const current = previous.then(task);
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(filePath, tail);

    try {
      return await current;
    } finally {
      if (this.locks.get(filePath) === tail) {
        this.locks.delete(filePath);
      }
    }
  }
}
