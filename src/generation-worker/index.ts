export { GenerationWorker, DEFAULT_STOP_GRACE_MS } from './GenerationWorker';
export { WorkerStateMachine, workerStateMachine } from './state-machine';
export { generateTaskId, parseTaskId, isValidTaskId } from './task-id-generator';
export type {
  ChunkEvent,
  GenerationTask,
  GenerationWorkerOptions,
  StopResult,
  TerminalState,
  TokenLimitEvent,
  WorkerErrorEvent,
  WorkerEvents,
  WorkerOutcome,
  WorkerState,
} from './types';
