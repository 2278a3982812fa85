// === src/main.ts ===
// Public surface of the session core.

export { ErrorCategory, XError, isXError } from './shared/errors.js';
export type { Disposer, LogContext, Result } from './shared/types.js';

export { OutputBuffer } from './core/buffer/OutputBuffer.js';
export type {
  BufferChange,
  BufferMetrics,
  IOutputBuffer,
  Line,
  SnapshotSource,
} from './core/buffer/OutputBuffer.js';
export { LineAssembler, cleanLine } from './core/buffer/LineAssembler.js';

export { SearchService, compileQuery, createSearchQuery, sameQuery } from './core/search/SearchService.js';
export type { ISearchService, MatchResult, SearchOutcome, SearchQuery, SearchQueryInput } from './core/search/SearchService.js';
export { SearchSession } from './core/search/SearchSession.js';
export type {
  HighlightKind,
  NavigateToLine,
  NavigationResult,
  SearchObserver,
  SearchResultsChanged,
  SearchStatus,
} from './core/search/SearchSession.js';

export {
  AGGRESSIVE_RETRY_POLICY,
  DEFAULT_RETRY_POLICY,
  NO_RETRY_POLICY,
  canRetry,
  computeBackoffDelay,
  createRetryPolicy,
} from './core/connection/RetryPolicy.js';
export type { RetryPolicy, RetryPolicyInput } from './core/connection/RetryPolicy.js';
export type { Transport, TransportClosed, TransportListener } from './core/connection/transport.js';
export { SshTransport } from './core/connection/SshTransport.js';
export { ConnectionLifecycleController } from './core/connection/ConnectionLifecycleController.js';
export type {
  ConnectionSnapshot,
  ConnectionState,
  ConnectionStatusEvent,
  ControllerOptions,
} from './core/connection/ConnectionLifecycleController.js';
export { toStatusView } from './core/state/statusView.js';
export type { StatusKind, StatusView } from './core/state/statusView.js';

export { SessionOrchestrator } from './core/sessions/SessionOrchestrator.js';
export type { SessionCallbacks, SessionOrchestratorOptions } from './core/sessions/SessionOrchestrator.js';
export { createSshSession } from './core/sessions/createSshSession.js';

export { SessionConfigSchema, parseConfig } from './core/config/schema.js';
export type { ScrollbackConfig, SessionConfig, SessionConfigInput, SshTarget } from './core/config/schema.js';
export {
  connectionId,
  getConfigFilePath,
  markRecent,
  readSessionConfig,
  saveSessionConfig,
  toSessionConfig,
  upsertConnection,
} from './core/config/session-config.js';

export {
  addLogSink,
  clearBufferedLogs,
  getBufferedLogs,
  getLogger,
  removeLogSink,
  setLogLevel,
} from './core/logging/logger.js';
export type { LogLevel, LogSink, Logger } from './core/logging/logger.js';
export { globalProfiler, measure, measureBlock } from './core/logging/perf.js';
