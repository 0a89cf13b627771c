export { EwsAnalyzerClient, withAnalyzerClient } from "./client/analyzer-client.js";
export { RpcChannel, type CallOptions, type ChannelStreams } from "./client/channel.js";
export { LineReader } from "./client/line-reader.js";
export {
  spawnWithPipes,
  type SpawnProcess,
  type SpawnRequest,
  type SpawnedProcess,
} from "./client/process.js";
export {
  ProcessSupervisor,
  type InitializeResult,
  type ServerInfo,
  type SupervisorOptions,
} from "./client/supervisor.js";
export type {
  AuthMethod,
  ConversionTier,
  GraphPromptRequest,
  PromptDescriptor,
  ResourceDescriptor,
  ToolDescriptor,
  ToolResult,
} from "./client/types.js";
export {
  loadJsonConfig,
  resolveClientSettings,
  type ClientSettings,
  type LoadedConfig,
} from "./config.js";
export type {
  JsonRpcError,
  JsonRpcParams,
  JsonRpcRequest,
  JsonRpcResponse,
} from "./protocols/jsonrpc/types.js";
export {
  ChannelBusyError,
  ConfigError,
  HandshakeError,
  ProtocolDecodeError,
  ProtocolViolationError,
  RequestTimeoutError,
  RpcClientError,
  SpawnError,
  TransportError,
  type RpcErrorKind,
} from "./shared/errors.js";
export { initLogger } from "./shared/logging.js";
