import { existsSync } from 'node:fs';
import { isAbsolute } from 'node:path';
import type { Readable, Writable } from 'node:stream';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { DebugLogger } from '../debug/debug-logger.js';
import { describeError } from '../errors.js';
import {
  DiagnosticSeverity,
  type Diagnostic,
  type Hover,
  type Location,
  type MarkedString,
  type Position,
} from '../service/protocol.js';
import type { LspSession } from '../service/session.js';
import { fromFileUri } from '../service/uri.js';

/** The slice of a session the tools call into. */
export type LspToolBackend = Pick<
  LspSession,
  | 'ensureSynced'
  | 'documentDiagnostics'
  | 'hover'
  | 'gotoDefinition'
  | 'findReferences'
>;

type TextResult = {
  content: [{ type: 'text'; text: string }];
  isError?: boolean;
};

export const SERVER_NAME = 'lsp-sidecar-mcp';
export const SERVER_VERSION = '0.1.0';

export const SERVER_INSTRUCTIONS =
  'Provides rust-analyzer intelligence via lspmux. ' +
  'Use rust_diagnostics to check for errors, rust_hover for type info, ' +
  'rust_goto_definition to find definitions, and rust_find_references ' +
  'to find all usages.';

const fileSchema = {
  file_path: z.string().describe('Absolute path to the Rust source file.'),
};

const filePositionSchema = {
  ...fileSchema,
  line: z.number().int().nonnegative().describe('Zero-based line number.'),
  character: z
    .number()
    .int()
    .nonnegative()
    .describe('Zero-based character offset.'),
};

const logger = DebugLogger.getLogger('mcp');

const toTextResult = (text: string, isError = false): TextResult => ({
  content: [{ type: 'text', text }],
  ...(isError ? { isError: true } : {}),
});

/**
 * Returns the problem with `filePath` as a tool argument, or null when it is
 * an absolute path to something that exists.
 */
export const validateFilePath = (filePath: string): string | null => {
  if (!isAbsolute(filePath)) {
    return `file_path must be absolute, got: ${filePath}`;
  }
  if (!existsSync(filePath)) {
    return `file not found: ${filePath}`;
  }
  return null;
};

const formatLineCol = (position: Position): string =>
  `${position.line + 1}:${position.character + 1}`;

export const formatLocation = (location: Location): string =>
  `${fromFileUri(location.uri)}:${formatLineCol(location.range.start)}`;

const severityLabel = (severity: number | undefined): string => {
  switch (severity) {
    case DiagnosticSeverity.Error:
      return 'ERROR';
    case DiagnosticSeverity.Warning:
      return 'WARNING';
    case DiagnosticSeverity.Information:
      return 'INFO';
    case DiagnosticSeverity.Hint:
      return 'HINT';
    default:
      return 'UNKNOWN';
  }
};

export const formatDiagnostic = (diagnostic: Diagnostic): string =>
  `${formatLineCol(diagnostic.range.start)}: [${severityLabel(diagnostic.severity)}] ${diagnostic.message}`;

const formatMarkedString = (value: MarkedString): string =>
  typeof value === 'string'
    ? value
    : `\`\`\`${value.language}\n${value.value}\n\`\`\``;

export const formatHover = (hover: Hover): string => {
  const { contents } = hover;
  if (Array.isArray(contents)) {
    return contents.map(formatMarkedString).join('\n\n');
  }
  if (typeof contents === 'string') {
    return contents;
  }
  if ('kind' in contents) {
    return contents.value;
  }
  return formatMarkedString(contents);
};

/**
 * Validates the path and brings the server's copy of it up to date. Returns
 * an error result to hand back to the caller, or null to proceed.
 *
 * @throws {McpError} `InvalidParams` for a relative or missing path.
 */
const prepareFile = async (
  backend: LspToolBackend,
  filePath: string,
): Promise<TextResult | null> => {
  const invalid = validateFilePath(filePath);
  if (invalid !== null) {
    throw new McpError(ErrorCode.InvalidParams, invalid);
  }
  try {
    await backend.ensureSynced(filePath);
    return null;
  } catch (error) {
    return toTextResult(`Failed to open file: ${describeError(error)}`, true);
  }
};

/**
 * Registers the four navigation tools on a fresh MCP server and connects it
 * over the given streams.
 */
export async function createMcpChannel(
  backend: LspToolBackend,
  inputStream: Readable,
  outputStream: Writable,
): Promise<McpServer> {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: SERVER_INSTRUCTIONS },
  );

  server.tool(
    'rust_diagnostics',
    'Get Rust compiler errors and warnings for a file. Returns diagnostics with line numbers, severity, and messages.',
    fileSchema,
    async (args) => {
      const failed = await prepareFile(backend, args.file_path);
      if (failed) {
        return failed;
      }
      try {
        const report = await backend.documentDiagnostics(args.file_path);
        const items = report.kind === 'full' ? report.items : [];
        if (items.length === 0) {
          return toTextResult('No diagnostics found.');
        }
        return toTextResult(items.map(formatDiagnostic).join('\n'));
      } catch (error) {
        logger.warn(() => `rust_diagnostics failed: ${describeError(error)}`);
        return toTextResult(
          `Diagnostics request failed: ${describeError(error)}\n\n` +
            'Note: rust-analyzer may still be loading. Try again in a few seconds.',
          true,
        );
      }
    },
  );

  server.tool(
    'rust_hover',
    'Get type signature and documentation for a symbol at a specific position in a Rust file.',
    filePositionSchema,
    async (args) => {
      const failed = await prepareFile(backend, args.file_path);
      if (failed) {
        return failed;
      }
      try {
        const hover = await backend.hover(
          args.file_path,
          args.line,
          args.character,
        );
        return toTextResult(
          hover === null
            ? 'No hover information available at this position.'
            : formatHover(hover),
        );
      } catch (error) {
        return toTextResult(
          `Hover request failed: ${describeError(error)}`,
          true,
        );
      }
    },
  );

  server.tool(
    'rust_goto_definition',
    'Find where a symbol is defined. Returns the file path and line number of the definition.',
    filePositionSchema,
    async (args) => {
      const failed = await prepareFile(backend, args.file_path);
      if (failed) {
        return failed;
      }
      try {
        const locations = await backend.gotoDefinition(
          args.file_path,
          args.line,
          args.character,
        );
        if (locations === null) {
          return toTextResult('No definition found at this position.');
        }
        if (locations.length === 0) {
          return toTextResult('No definition found.');
        }
        return toTextResult(locations.map(formatLocation).join('\n'));
      } catch (error) {
        return toTextResult(
          `Go to definition failed: ${describeError(error)}`,
          true,
        );
      }
    },
  );

  server.tool(
    'rust_find_references',
    'Find all references to a symbol at a specific position. Returns a list of file paths and line numbers.',
    filePositionSchema,
    async (args) => {
      const failed = await prepareFile(backend, args.file_path);
      if (failed) {
        return failed;
      }
      try {
        const locations = await backend.findReferences(
          args.file_path,
          args.line,
          args.character,
        );
        if (locations === null) {
          return toTextResult('No references found at this position.');
        }
        if (locations.length === 0) {
          return toTextResult('No references found.');
        }
        return toTextResult(
          `Found ${locations.length} reference(s):\n` +
            locations.map(formatLocation).join('\n'),
        );
      } catch (error) {
        return toTextResult(
          `Find references failed: ${describeError(error)}`,
          true,
        );
      }
    },
  );

  const transport = new StdioServerTransport(inputStream, outputStream);
  await server.connect(transport);

  return server;
}
