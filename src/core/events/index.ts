export { ReviewEventBus } from './event-bus';
export type {
  ReviewEvent,
  ReviewEventType,
  ReviewEventPayloads,
  ReviewEventSink,
  ReviewEventListener,
} from './types';
