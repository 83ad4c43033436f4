#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import { stderr } from 'node:process';
import { pathToFileURL } from 'node:url';

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { createMcpChannel } from './channels/mcp-channel.js';
import { loadConfig } from './config.js';
import { DebugLogger } from './debug/debug-logger.js';
import { describeError } from './errors.js';
import { startSession, type LspSession } from './service/session.js';

const logger = DebugLogger.getLogger('main');

export async function main(): Promise<void> {
  const config = loadConfig();
  DebugLogger.setLevel(config.logLevel);

  logger.info(`lspmux binary: ${config.sidecar.command}`);
  logger.info(`sidecar args: ${config.sidecar.args.join(' ')}`);
  logger.info(`workspace root: ${config.workspaceRoot}`);

  let session: LspSession;
  try {
    session = await startSession(config.sidecar, config.session);
  } catch (error) {
    throw new Error(`failed to initialize LSP client: ${describeError(error)}`, {
      cause: error,
    });
  }

  let mcpServer: McpServer;
  try {
    mcpServer = await createMcpChannel(session, process.stdin, process.stdout);
  } catch (error) {
    await session.shutdown();
    throw new Error(`failed to start MCP server: ${describeError(error)}`, {
      cause: error,
    });
  }

  let shuttingDown = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`shutting down (${reason})`);

    try {
      await mcpServer.close();
    } catch (error) {
      logger.warn(`failed to close MCP server: ${describeError(error)}`);
    }
    await session.shutdown();
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // The stdio transport does not report the client going away.
  process.stdin.once('end', () => {
    void shutdown('stdin closed');
  });

  process.on('unhandledRejection', (error) => {
    stderr.write(`Unhandled rejection in LSP MCP server: ${String(error)}\n`);
  });
}

const isMainModule = (): boolean => {
  const argvEntry = process.argv[1];
  if (!argvEntry || !import.meta.url.startsWith('file://')) {
    return false;
  }

  // npm links bins through symlinks; the module URL is the real path.
  try {
    return import.meta.url === pathToFileURL(realpathSync(argvEntry)).href;
  } catch {
    return false;
  }
};

if (isMainModule()) {
  void main().catch((error: unknown) => {
    stderr.write(`Fatal error in LSP MCP server: ${describeError(error)}\n`);
    process.exit(1);
  });
}
