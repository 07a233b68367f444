export { BulkScheduler } from './bulk-scheduler';
export type {
  BulkScheduleRequest,
  BulkScheduleResult,
  BulkItemFailure,
  BulkSchedulerConfig,
  BulkSchedulerDependencies,
} from './types';
