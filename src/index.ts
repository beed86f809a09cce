export { createClient, type Client } from "./client.js";

export {
  SessionManager,
  DeviceSession,
  type SessionManagerOptions,
  type SessionState,
} from "./session.js";

export {
  SshBackend,
  type BackendConnection,
  type DeviceBackend,
} from "./backend.js";

export { SessionCache, type SessionCacheOptions } from "./session-cache.js";

export {
  ensureRemoteDir,
  remotePathFor,
  relativeSegments,
} from "./remote-fs.js";

export {
  runStreaming,
  type RunningProgram,
  type StreamOptions,
} from "./stream-exec.js";

export { SshTransportFactory } from "./ssh-transport.js";
export { LineReader } from "./line-reader.js";

export type {
  Address,
  ExecResult,
  FileTransferChannel,
  ProbeResult,
  RemoteProcess,
  TransportFactory,
  TransportHandle,
} from "./transport.js";

export {
  classifyAddress,
  type AddressKind,
  type DeviceDiscovery,
} from "./address.js";

export {
  loadConfig,
  credentialsFrom,
  DEFAULT_CONFIG,
  type BrickdevConfig,
  type Credentials,
} from "./config.js";

export {
  compileFile,
  compilerVersion,
  saveInlineScript,
  formatMpy,
} from "./compile.js";

export {
  ConnectionError,
  RemoteFilesystemError,
  TransferError,
  ProcessSpawnError,
  StreamReadError,
  TimeoutError,
  UnsupportedAddressError,
  DeviceNotFoundError,
  CompileError,
  SessionStateError,
  describeError,
} from "./errors.js";

export {
  StructuredLogger,
  ConsoleLogger,
  NullLogger,
  LOG_LEVELS,
  parseLogLevel,
  type Logger,
  type LogEntry,
  type LogLevel,
} from "./logger.js";
