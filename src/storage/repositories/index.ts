/**
 * Repository exports.
 */

export type { Repository } from './base';

export {
  MemoryItemRepository,
  type CreateMemoryItemInput,
  type UpdateMemoryItemInput,
} from './memory-item.repository';
export { ReviewScheduleRepository } from './review-schedule.repository';
export { ReviewHistoryRepository } from './review-history.repository';
export { ReviewSessionRepository } from './review-session.repository';
