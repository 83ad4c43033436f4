import { join, resolve } from 'node:path';

import { z } from 'zod';

import { LOG_LEVELS, type LogLevel } from './debug/debug-logger.js';
import { ConfigError } from './errors.js';
import {
  DEFAULT_MAX_MESSAGE_BYTES,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SHUTDOWN_GRACE_MS,
  type SessionOptions,
  type SidecarCommand,
} from './types.js';

export interface ServiceConfig {
  sidecar: SidecarCommand;
  workspaceRoot: string;
  session: SessionOptions;
  logLevel: LogLevel;
}

// Set-but-empty counts as unset.
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  HOME: z.string().default(''),
  CARGO_HOME: optionalString,
  XDG_DATA_HOME: optionalString,
  LSPMUX_PATH: optionalString,
  RUST_ANALYZER_PATH: optionalString,
  WORKSPACE_ROOT: optionalString,
  LSP_REQUEST_TIMEOUT_MS: positiveInt(DEFAULT_REQUEST_TIMEOUT_MS),
  LSP_MAX_MESSAGE_BYTES: positiveInt(DEFAULT_MAX_MESSAGE_BYTES),
  LSP_SHUTDOWN_GRACE_MS: positiveInt(DEFAULT_SHUTDOWN_GRACE_MS),
  LSP_MCP_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

/**
 * Resolves the service configuration from environment variables.
 *
 * The sidecar is `lspmux client --server-path <rust-analyzer>`; both binaries
 * default to where their installers put them under the user's home.
 *
 * @throws {ConfigError} listing every variable that failed to parse.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }
  const vars = parsed.data;

  const cargoHome = vars.CARGO_HOME ?? join(vars.HOME, '.cargo');
  const dataHome = vars.XDG_DATA_HOME ?? join(vars.HOME, '.local', 'share');
  const lspmuxPath = vars.LSPMUX_PATH ?? join(cargoHome, 'bin', 'lspmux');
  const rustAnalyzerPath =
    vars.RUST_ANALYZER_PATH ??
    join(dataHome, 'lspmux-rust-analyzer', 'current', 'rust-analyzer');
  const workspaceRoot = resolve(cwd, vars.WORKSPACE_ROOT ?? '.');

  return {
    sidecar: {
      command: lspmuxPath,
      args: ['client', '--server-path', rustAnalyzerPath],
      cwd: workspaceRoot,
    },
    workspaceRoot,
    session: {
      workspaceRoot,
      requestTimeoutMs: vars.LSP_REQUEST_TIMEOUT_MS,
      maxMessageBytes: vars.LSP_MAX_MESSAGE_BYTES,
      shutdownGraceMs: vars.LSP_SHUTDOWN_GRACE_MS,
    },
    logLevel: vars.LSP_MCP_LOG_LEVEL,
  };
}
