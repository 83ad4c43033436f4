export type JsonRpcId = number | string;

export type JsonRpcRequest = {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: unknown;
};

export type JsonRpcNotification = {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
};

export type JsonRpcErrorObject = {
  code: number;
  message: string;
  data?: unknown;
};

export type JsonRpcResponse = {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  result?: unknown;
  error?: JsonRpcErrorObject;
};

export type JsonRpcMessage =
  | JsonRpcRequest
  | JsonRpcNotification
  | JsonRpcResponse;

export const JSON_RPC_METHOD_NOT_FOUND = -32601;

export type SessionState =
  | 'starting'
  | 'handshaking'
  | 'ready'
  | 'shutting-down'
  | 'terminated';

export interface SidecarCommand {
  command: string;
  args: string[];
  /** Extra variables merged over the parent environment. */
  env?: Record<string, string>;
  cwd?: string;
}

export interface SessionOptions {
  /** Absolute path sent as `rootUri`; `null` omits a workspace. */
  workspaceRoot: string | null;
  requestTimeoutMs: number;
  maxMessageBytes: number;
  shutdownGraceMs: number;
  clientInfo?: { name: string; version: string };
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_MESSAGE_BYTES = 100 * 1024 * 1024;
export const DEFAULT_SHUTDOWN_GRACE_MS = 5_000;

export const defaultSessionOptions: SessionOptions = {
  workspaceRoot: null,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
  maxMessageBytes: DEFAULT_MAX_MESSAGE_BYTES,
  shutdownGraceMs: DEFAULT_SHUTDOWN_GRACE_MS,
};
