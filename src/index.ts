export {
  ConfigError,
  config,
  loadTransferConfig,
  resolveTransferConfig,
  transferConfigSchema,
  type TransferConfig,
} from './config.js';
export {
  getErrorMessage,
  RedirectError,
  type RedirectErrorCode,
} from './errors.js';
export {
  createTransferSession,
  TransferSession,
  type TransferSessionOptions,
} from './services/transfer-session.js';
export {
  InstrumentedClient,
  type InstrumentedClientOptions,
  type TransferResponse,
} from './services/transfer/client.js';
export {
  ByteCountingStream,
  type ByteCountingStreamOptions,
} from './services/transfer/counting-stream.js';
export {
  MAX_REDIRECTS,
  RedirectPolicy,
  type RedirectPolicyOptions,
} from './services/transfer/redirect-policy.js';
export {
  TransferRegistry,
  type BucketEntry,
} from './services/transfer/registry.js';
export {
  formatTransferLine,
  StatsReporter,
  type StatsReporterOptions,
} from './services/transfer/stats-reporter.js';
export {
  createConfigTlsPolicy,
  type TlsDecision,
  type TlsPolicy,
  type TrustedRoots,
} from './services/transfer/tls-policy.js';
export {
  isTraceableContent,
  stderrTraceSink,
  TraceEmitter,
  type TraceOptions,
  type TraceSink,
} from './services/transfer/trace.js';
export {
  buildAgentOptions,
  TransportCache,
  type AgentOptions,
  type DispatcherFactory,
} from './services/transfer/transport-cache.js';
export type {
  HeaderRecord,
  HopRequest,
  RequestBody,
  ResponseHead,
  ResponseHeaders,
  TransferId,
  TransferRecord,
  TransferRequest,
  TransferStats,
} from './services/transfer/types.js';
