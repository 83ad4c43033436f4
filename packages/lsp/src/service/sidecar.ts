import { spawn, type ChildProcessByStdio } from 'node:child_process';
import { existsSync } from 'node:fs';
import type { Readable, Writable } from 'node:stream';

import { DebugLogger } from '../debug/debug-logger.js';
import { SidecarSpawnError } from '../errors.js';
import type { SidecarCommand } from '../types.js';

/**
 * The process end of a session: its two pipes plus wait/kill. The read
 * half goes to the reader loop, the write half to the frame writer.
 */
export interface SidecarProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly pid: number | undefined;
  /** Resolves true if the process exits within `timeoutMs`. */
  waitForExit(timeoutMs: number): Promise<boolean>;
  kill(): void;
}

const logger = DebugLogger.getLogger('sidecar');

type ExitStatus = { code: number | null; signal: NodeJS.Signals | null };

export class ChildSidecar implements SidecarProcess {
  private readonly exited: Promise<ExitStatus>;

  constructor(
    private readonly child: ChildProcessByStdio<Writable, Readable, null>,
  ) {
    this.exited = new Promise<ExitStatus>((resolve) => {
      if (child.exitCode !== null || child.signalCode !== null) {
        resolve({ code: child.exitCode, signal: child.signalCode });
        return;
      }
      child.once('exit', (code, signal) => {
        resolve({ code, signal });
      });
    });
  }

  get stdin(): Writable {
    return this.child.stdin;
  }

  get stdout(): Readable {
    return this.child.stdout;
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  async waitForExit(timeoutMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), timeoutMs);
    });

    try {
      const status = await Promise.race([this.exited, timedOut]);
      if (status === null) {
        return false;
      }
      logger.info(
        `LSP child exited with ${status.signal ?? `code ${String(status.code)}`}`,
      );
      return true;
    } finally {
      clearTimeout(timer);
    }
  }

  kill(): void {
    if (this.child.exitCode !== null || this.child.signalCode !== null) {
      return;
    }
    this.child.kill('SIGKILL');
  }
}

/**
 * Starts the sidecar with piped stdin/stdout. stderr is inherited so a
 * chatty server cannot fill an unread pipe and stall.
 */
export async function spawnSidecar(
  sidecar: SidecarCommand,
): Promise<ChildSidecar> {
  const cwd =
    sidecar.cwd !== undefined && existsSync(sidecar.cwd)
      ? sidecar.cwd
      : process.cwd();

  let child: ChildProcessByStdio<Writable, Readable, null>;
  try {
    child = spawn(sidecar.command, sidecar.args, {
      cwd,
      env: { ...process.env, ...sidecar.env },
      stdio: ['pipe', 'pipe', 'inherit'],
    });
  } catch (error) {
    throw new SidecarSpawnError(sidecar.command, { cause: error });
  }

  await new Promise<void>((resolve, reject) => {
    const onSpawn = (): void => {
      child.off('error', onError);
      resolve();
    };
    const onError = (error: Error): void => {
      child.off('spawn', onSpawn);
      reject(new SidecarSpawnError(sidecar.command, { cause: error }));
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });

  child.on('error', (error: Error) => {
    logger.error(`LSP child process error: ${error.message}`);
  });

  logger.info(`spawned '${sidecar.command}' (pid ${String(child.pid)})`);
  return new ChildSidecar(child);
}
