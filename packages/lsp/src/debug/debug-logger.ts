import createDebug from 'debug';
import type { Debugger } from 'debug';

export const LOG_LEVELS = [
  'debug',
  'info',
  'warn',
  'error',
  'silent',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type EmittingLevel = Exclude<LogLevel, 'silent'>;

type LogMessage = string | (() => string);

const EMITTING_LEVELS: readonly EmittingLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
];

export const ROOT_NAMESPACE = 'lsp-mcp';

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

/**
 * Namespaced logger on top of `debug`. Every level has its own channel
 * (`<namespace>:<level>`), so `DEBUG=lsp-mcp:*` still turns everything on
 * while the threshold decides what is printed by default. Output goes to
 * stderr: stdout carries the MCP transport.
 */
export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();
  private static threshold: LogLevel = 'warn';

  private readonly channels: Record<EmittingLevel, Debugger>;

  static getLogger(namespace: string): DebugLogger {
    const qualified = namespace.startsWith(ROOT_NAMESPACE)
      ? namespace
      : `${ROOT_NAMESPACE}:${namespace}`;
    let logger = DebugLogger.instances.get(qualified);
    if (!logger) {
      logger = new DebugLogger(qualified);
      DebugLogger.instances.set(qualified, logger);
    }
    return logger;
  }

  static setLevel(level: LogLevel): void {
    DebugLogger.threshold = level;
    for (const logger of DebugLogger.instances.values()) {
      logger.applyThreshold();
    }
  }

  static getLevel(): LogLevel {
    return DebugLogger.threshold;
  }

  /**
   * Restores the default threshold on every cached logger.
   */
  static resetForTesting(): void {
    DebugLogger.setLevel('warn');
  }

  private constructor(readonly namespace: string) {
    this.channels = {
      debug: createDebug(`${namespace}:debug`),
      info: createDebug(`${namespace}:info`),
      warn: createDebug(`${namespace}:warn`),
      error: createDebug(`${namespace}:error`),
    };
    this.applyThreshold();
  }

  isEnabled(level: EmittingLevel): boolean {
    return this.channels[level].enabled;
  }

  debug(message: LogMessage, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: LogMessage, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: LogMessage, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: LogMessage, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  private write(
    level: EmittingLevel,
    messageOrFn: LogMessage,
    args: unknown[],
  ): void {
    const channel = this.channels[level];
    if (!channel.enabled) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    channel(message, ...args);
  }

  private applyThreshold(): void {
    const floor = LOG_LEVELS.indexOf(DebugLogger.threshold);
    for (const level of EMITTING_LEVELS) {
      const channel = this.channels[level];
      channel.enabled =
        createDebug.enabled(channel.namespace) ||
        LOG_LEVELS.indexOf(level) >= floor;
    }
  }
}
