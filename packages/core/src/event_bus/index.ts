export { EventBus, publishConversionEvent } from './event_bus';
export type { IEventStream } from './event_bus';
export type {
  BaseEvent,
  ConversionEvent,
  ConversionStartedEvent,
  ConversionProgressEvent,
  ConversionCompletedEvent,
  EventHandler,
  EventSubscription,
} from './types';
