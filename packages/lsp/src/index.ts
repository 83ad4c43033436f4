export * from './errors.js';
export * from './types.js';
export { loadConfig, type ServiceConfig } from './config.js';
export {
  DebugLogger,
  LOG_LEVELS,
  isLogLevel,
  type LogLevel,
} from './debug/debug-logger.js';
export {
  createMcpChannel,
  type LspToolBackend,
} from './channels/mcp-channel.js';
export { ResponseCorrelator } from './service/correlator.js';
export {
  DocumentSyncTracker,
  fingerprint,
  type SyncOutcome,
} from './service/document-sync.js';
export { encodeFrame, FrameDecoder, FrameWriter } from './service/framing.js';
export { detectLanguageId, getLanguageId } from './service/language-map.js';
export type {
  Diagnostic,
  DocumentDiagnosticReport,
  Hover,
  Location,
  Position,
  Range,
} from './service/protocol.js';
export { runReaderLoop } from './service/reader-loop.js';
export {
  LspSession,
  startSession,
  type RequestOptions,
} from './service/session.js';
export { spawnSidecar, type SidecarProcess } from './service/sidecar.js';
export { fromFileUri, toFileUri } from './service/uri.js';
