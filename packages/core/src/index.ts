/**
 * @tg-relay/core
 *
 * Core domain package containing:
 * - Task and batch state machines
 * - Source reference parsing and resolution
 * - Error taxonomy
 * - Collaborator contracts (network client, sessions, ledger, storage)
 * - Shared types
 */

// State machine
export {
  isValidTaskTransition,
  isValidBatchTransition,
  getNextTaskStates,
  isTerminalTaskState,
  isTerminalBatchState,
  transitionTask,
  transitionBatch,
} from './stateMachine.js';

// References
export {
  parseSourceLink,
  resolveReference,
  requiredCapability,
  expandReferenceRange,
} from './reference.js';

// Tasks
export { createTask, toOutcomeRecord } from './task.js';

// Types
export type {
  Capability,
  ReferenceForm,
  SourceReference,
  ResolvedReference,
} from './types/reference.js';

export type {
  Task,
  TaskInput,
  TaskState,
  TerminalTaskState,
  FailureCode,
  FailureReason,
  TaskOutcomeRecord,
} from './types/task.js';

export type {
  BatchJob,
  BatchState,
  BatchRequest,
  BatchProgress,
} from './types/batch.js';

export type {
  ClientHandle,
  ConnectivityState,
  HandleStateChange,
} from './types/client.js';

// Contracts
export type {
  SourceNetworkClient,
  FetchedContent,
  FetchError,
  FetchResult,
  FetchRequest,
  DeliveryMode,
  DeliverError,
  DeliverResult,
  DeliverRequest,
} from './contracts/network.js';

export type { SessionConnector } from './contracts/session.js';

export type {
  TrafficLedger,
  LimitKind,
  ReservationResult,
  TransferOutcome,
} from './contracts/ledger.js';

export type {
  HistoryStore,
  BatchStore,
  ProgressReporter,
} from './contracts/storage.js';

// Errors
export {
  RelayError,
  ValidationError,
  StateTransitionError,
  NotFoundError,
  InvalidReferenceError,
  AccessDeniedError,
  ThrottledError,
  QuotaExceededError,
  DeliveryFailedError,
  RetriesExhaustedError,
  CapabilityError,
  CancelledError,
  QueueFullError,
  QueueClosedError,
  toFailureReason,
  type CapabilityErrorKind,
} from './errors/index.js';
