// Producer-side API for services that embed the pipeline
export { EnqueueModule } from './enqueue/enqueue.module';
export { TransactionEnqueuerService } from './enqueue/transaction-enqueuer.service';
export type { EnqueueResult } from './enqueue/transaction-enqueuer.service';
export { SLOW_CALL_SINK, FileSlowCallSink, LoggerSlowCallSink } from './enqueue/slow-call.sink';
export type { SlowCallSink } from './enqueue/slow-call.sink';
export { StatementService } from './statements/statement.service';
export { TableRegistry } from './statements/table-registry';
export * from './statements/statement-builder';
export type { RowData, SqlValue, Statement, StatementOptions, UnknownFieldPolicy } from './statements/statement.types';
export { FIELD_TYPES } from './statements/field-types';
export type { FieldType, FieldTypeName } from './statements/field-types';

// Worker
export { WorkerModule } from './worker/worker.module';
export { QueueWorkerService, WorkerState } from './worker/queue-worker.service';
export type { IterationOutcome } from './worker/queue-worker.service';
export { BatchExecutor } from './worker/batch-executor';

// Contracts and wire format
export { MESSAGE_BUS } from './bus/message-bus';
export type { MessageBus, PulledMessage } from './bus/message-bus';
export { CORRELATION_STORE } from './store/correlation-store';
export type { CorrelationStore } from './store/correlation-store';
export { RELATIONAL_DATABASE } from './database/relational-database';
export type { QueryOutcome, RelationalDatabase } from './database/relational-database';
export * from './pipeline/types';
export * from './pipeline/envelope';
export { TIMER, statementTimer } from './pipeline/timers';
export * from './common/errors';
export { PIPELINE_CLOCK, retryWithBackoff, systemClock } from './common/retry';
export type { Clock, RetryOptions, RetryPolicy } from './common/retry';

// Configuration sections
export { default as databaseConfig } from './config/database.config';
export { default as busConfig } from './config/bus.config';
export { default as storeConfig } from './config/store.config';
export { default as pipelineConfig } from './config/pipeline.config';
export { default as tablesConfig } from './config/tables.config';
