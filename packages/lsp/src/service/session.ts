import { basename } from 'node:path';

import { DebugLogger } from '../debug/debug-logger.js';
import {
  ConnectionClosedError,
  describeError,
  HandshakeError,
  ResponseError,
} from '../errors.js';
import {
  defaultSessionOptions,
  JSON_RPC_METHOD_NOT_FOUND,
  type JsonRpcRequest,
  type SessionOptions,
  type SessionState,
  type SidecarCommand,
} from '../types.js';
import { ResponseCorrelator } from './correlator.js';
import {
  DocumentSyncTracker,
  type DocumentNotifier,
  type OpenDocument,
  type SyncOutcome,
  type TextReader,
} from './document-sync.js';
import { FrameWriter } from './framing.js';
import {
  definitionSchema,
  documentDiagnosticReportSchema,
  hoverSchema,
  initializeResultSchema,
  normalizeDefinition,
  parseResult,
  referencesSchema,
  type DocumentDiagnosticReport,
  type Hover,
  type InitializeResult,
  type Location,
} from './protocol.js';
import { runReaderLoop } from './reader-loop.js';
import { spawnSidecar, type SidecarProcess } from './sidecar.js';
import { toFileUri } from './uri.js';

export interface RequestOptions {
  timeoutMs?: number;
}

export interface ConnectOptions {
  /** Replaces disk reads in document sync. */
  readText?: TextReader;
}

const DEFAULT_CLIENT_INFO = { name: 'lsp-sidecar-mcp', version: '0.1.0' };

const CLIENT_CAPABILITIES = {
  textDocument: {
    synchronization: { dynamicRegistration: false, didSave: false },
    hover: { contentFormat: ['markdown', 'plaintext'] },
    definition: { linkSupport: true },
    references: { dynamicRegistration: false },
    diagnostic: { dynamicRegistration: false },
  },
};

const logger = DebugLogger.getLogger('session');

const textDocumentPosition = (
  filePath: string,
  line: number,
  character: number,
) => ({
  textDocument: { uri: toFileUri(filePath) },
  position: { line, character },
});

/**
 * A live JSON-RPC connection to one sidecar process.
 *
 * `starting → handshaking → ready → shutting-down → terminated`. A failed
 * handshake goes straight to `terminated` and the process is killed; a
 * reader loop that dies while `ready` does the same without a shutdown.
 */
export class LspSession implements DocumentNotifier {
  private state: SessionState = 'starting';
  private alive = true;
  private readonly correlator = new ResponseCorrelator();
  private readonly writer: FrameWriter;
  private readonly documents: DocumentSyncTracker;
  private shutdownRun: Promise<void> | null = null;

  /** Settles when the reader loop has exited; never rejects. */
  readonly closed: Promise<void>;

  private constructor(
    private readonly sidecar: SidecarProcess,
    private readonly options: SessionOptions,
    readText?: TextReader,
  ) {
    this.writer = new FrameWriter(sidecar.stdin);
    this.documents = new DocumentSyncTracker(this, readText);

    sidecar.stdin.on('error', (error: Error) => {
      logger.warn(`LSP stdin error: ${error.message}`);
    });

    this.closed = runReaderLoop(
      sidecar.stdout,
      {
        onResponse: (response) => {
          this.correlator.resolve(response);
        },
        onServerRequest: (request) => {
          this.declineServerRequest(request);
        },
      },
      { maxMessageBytes: options.maxMessageBytes },
    ).then(
      () => this.onReaderExit(null),
      (error: unknown) => this.onReaderExit(error),
    );
  }

  /**
   * Runs the handshake over an already spawned sidecar. The returned
   * session is `ready`; on failure the process is killed and
   * {@link HandshakeError} is thrown.
   */
  static async connect(
    sidecar: SidecarProcess,
    options: Partial<SessionOptions> = {},
    connectOptions: ConnectOptions = {},
  ): Promise<LspSession> {
    const session = new LspSession(
      sidecar,
      { ...defaultSessionOptions, ...options },
      connectOptions.readText,
    );

    try {
      await session.handshake();
    } catch (error) {
      session.terminate();
      if (error instanceof HandshakeError) {
        throw error;
      }
      throw new HandshakeError(`LSP initialize failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    return session;
  }

  getState(): SessionState {
    return this.state;
  }

  isAlive(): boolean {
    return this.alive;
  }

  get pendingRequestCount(): number {
    return this.correlator.size;
  }

  getDocument(filePath: string): Readonly<OpenDocument> | undefined {
    return this.documents.get(filePath);
  }

  /**
   * Sends a request and waits for its response. Rejects with
   * {@link ResponseError} when the server answers with an error object.
   */
  async request(
    method: string,
    params?: unknown,
    options: RequestOptions = {},
  ): Promise<unknown> {
    this.ensureAlive(method);

    const timeoutMs = options.timeoutMs ?? this.options.requestTimeoutMs;
    const { id, response } = this.correlator.register(method, timeoutMs);

    const sent = this.writer
      .write({
        jsonrpc: '2.0',
        id,
        method,
        ...(params === undefined ? {} : { params }),
      })
      .catch((error: unknown) => {
        this.correlator.abandon(id);
        throw new ConnectionClosedError(
          `failed to send '${method}': ${describeError(error)}`,
          { cause: error },
        );
      });

    const [, message] = await Promise.all([sent, response]);

    if (message.error) {
      throw new ResponseError(
        method,
        message.error.code,
        message.error.message,
        message.error.data,
      );
    }
    return message.result ?? null;
  }

  async notify(method: string, params?: unknown): Promise<void> {
    this.ensureAlive(method);
    try {
      await this.writer.write({
        jsonrpc: '2.0',
        method,
        ...(params === undefined ? {} : { params }),
      });
    } catch (error) {
      throw new ConnectionClosedError(
        `failed to send '${method}': ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Opens or refreshes `filePath` on the server from disk. Unchanged
   * content sends nothing.
   */
  async ensureSynced(filePath: string): Promise<SyncOutcome> {
    return this.documents.ensureSynced(filePath);
  }

  async hover(
    filePath: string,
    line: number,
    character: number,
  ): Promise<Hover | null> {
    const method = 'textDocument/hover';
    const result = await this.request(
      method,
      textDocumentPosition(filePath, line, character),
    );
    return parseResult(method, hoverSchema, result);
  }

  async gotoDefinition(
    filePath: string,
    line: number,
    character: number,
  ): Promise<Location[] | null> {
    const method = 'textDocument/definition';
    const result = await this.request(
      method,
      textDocumentPosition(filePath, line, character),
    );
    return normalizeDefinition(parseResult(method, definitionSchema, result));
  }

  async findReferences(
    filePath: string,
    line: number,
    character: number,
  ): Promise<Location[] | null> {
    const method = 'textDocument/references';
    const result = await this.request(method, {
      ...textDocumentPosition(filePath, line, character),
      context: { includeDeclaration: true },
    });
    return parseResult(method, referencesSchema, result);
  }

  async documentDiagnostics(
    filePath: string,
  ): Promise<DocumentDiagnosticReport> {
    const method = 'textDocument/diagnostic';
    const result = await this.request(method, {
      textDocument: { uri: toFileUri(filePath) },
    });
    return parseResult(method, documentDiagnosticReportSchema, result);
  }

  /**
   * Best-effort `shutdown` + `exit`, then up to the grace period for the
   * process to leave before it is killed. Never rejects; repeated calls
   * share the first run.
   */
  shutdown(): Promise<void> {
    if (this.shutdownRun === null) {
      this.shutdownRun = this.runShutdown();
    }
    return this.shutdownRun;
  }

  private async runShutdown(): Promise<void> {
    if (this.state === 'ready') {
      this.state = 'shutting-down';
    }

    try {
      await this.request('shutdown');
    } catch (error) {
      logger.warn(`LSP shutdown request failed: ${describeError(error)}`);
    }

    try {
      await this.notify('exit');
    } catch (error) {
      logger.warn(`LSP exit notification failed: ${describeError(error)}`);
    }

    this.writer.end();

    let exited = false;
    try {
      exited = await this.sidecar.waitForExit(this.options.shutdownGraceMs);
    } catch (error) {
      logger.warn(`Error waiting for LSP child: ${describeError(error)}`);
    }

    if (!exited) {
      logger.warn(
        `LSP child did not exit in ${this.options.shutdownGraceMs}ms, killing`,
      );
      try {
        this.sidecar.kill();
      } catch (error) {
        logger.error(`Failed to kill LSP child: ${describeError(error)}`);
      }
    }

    this.alive = false;
    this.state = 'terminated';
    this.correlator.drainAll(new ConnectionClosedError('LSP session shut down'));
  }

  private async handshake(): Promise<void> {
    this.state = 'handshaking';

    const root = this.options.workspaceRoot;
    let rootUri: string | null = null;
    if (root !== null) {
      try {
        rootUri = toFileUri(root);
      } catch (error) {
        throw new HandshakeError('invalid workspace root URI', {
          cause: error,
        });
      }
    }

    const result = await this.request('initialize', {
      processId: process.pid,
      clientInfo: this.options.clientInfo ?? DEFAULT_CLIENT_INFO,
      rootUri,
      workspaceFolders:
        rootUri === null || root === null
          ? null
          : [{ uri: rootUri, name: basename(root) }],
      capabilities: CLIENT_CAPABILITIES,
    });
    const initialized: InitializeResult = parseResult(
      'initialize',
      initializeResultSchema,
      result,
    );

    await this.notify('initialized', {});

    if (!this.alive) {
      throw new ConnectionClosedError();
    }
    this.state = 'ready';
    logger.info(
      () =>
        `LSP client initialized (server capabilities: ${Object.keys(initialized.capabilities).join(', ')})`,
    );
  }

  private ensureAlive(method: string): void {
    if (!this.alive) {
      throw new ConnectionClosedError(
        `Cannot send '${method}': LSP server is no longer running (child process exited)`,
      );
    }
  }

  private declineServerRequest(request: JsonRpcRequest): void {
    logger.debug(() => `declining server request '${request.method}'`);
    if (!this.alive) {
      return;
    }
    void this.writer
      .write({
        jsonrpc: '2.0',
        id: request.id,
        error: {
          code: JSON_RPC_METHOD_NOT_FOUND,
          message: `Unhandled method ${request.method}`,
        },
      })
      .catch((error: unknown) => {
        logger.warn(
          `failed to answer server request '${request.method}': ${describeError(error)}`,
        );
      });
  }

  private onReaderExit(error: unknown): void {
    if (error !== null) {
      logger.error(`LSP reader loop error: ${describeError(error)}`);
    }

    this.alive = false;
    if (this.state !== 'shutting-down') {
      this.state = 'terminated';
    }

    const drained = this.correlator.drainAll(
      new ConnectionClosedError(
        'LSP response channel closed (server may have crashed)',
        error === null ? undefined : { cause: error },
      ),
    );
    if (drained > 0) {
      logger.warn(`Reader loop exited with ${drained} pending request(s)`);
    }
  }

  /**
   * Forced teardown for a session that never became ready.
   */
  private terminate(): void {
    this.alive = false;
    this.state = 'terminated';
    this.correlator.drainAll(new ConnectionClosedError('LSP handshake failed'));
    this.writer.end();
    try {
      this.sidecar.kill();
    } catch (error) {
      logger.error(`Failed to kill LSP child: ${describeError(error)}`);
    }
  }
}

/**
 * Spawns the sidecar and completes the handshake. The child runs in the
 * workspace root unless the command names its own `cwd`.
 */
export async function startSession(
  command: SidecarCommand,
  options: Partial<SessionOptions> = {},
): Promise<LspSession> {
  const sidecar = await spawnSidecar({
    ...command,
    cwd: command.cwd ?? options.workspaceRoot ?? undefined,
  });
  return LspSession.connect(sidecar, options);
}
