/**
 * mcp-switchboard library surface
 */

export * from './backend/index.js';
export * from './types/server.js';
export * from './types/elicitation.js';
export * from './types/log.js';
export * from './types/config.js';
export * from './utils/index.js';
export {
    EnablementStore,
    createDefaultRecord,
    fromPersisted,
    toPersisted,
    type CapabilityKind,
    type EnablementRecord
} from './enablement/store.js';
export { OperationLog, DEFAULT_MAX_LOG_ENTRIES, PROXY_SERVER_NAME, type LogQuery, type OperationLogOptions, type OperationOutcome } from './logging/operation-log.js';
export { JsonlFileSink, LogEntrySchema, readJsonlLog, type LogSink, type ReadLogResult } from './logging/file-sink.js';
export {
    ElicitationCoordinator,
    ElicitationSession,
    type ElicitationCoordinatorOptions,
    type PresentationListener,
    type SessionState,
    type SubmitResult
} from './elicitation/coordinator.js';
export { ElicitationAudit, formatExecutionSummary, toElicitationRecord } from './elicitation/audit.js';
export {
    buildTypedContent,
    fieldPrompt,
    parseFieldValue,
    parseRequestedSchema,
    reservedAction
} from './elicitation/schema.js';
export { createProxyServer, startServer, SERVER_INFO } from './frontend/index.js';
