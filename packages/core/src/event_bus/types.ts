/**
 * Event Bus types for conversion progress reporting
 */

/**
 * Base event structure
 */
export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Event timestamp */
  timestamp: number;
  /** Event payload */
  payload: unknown;
  /** Source that emitted the event */
  source: string;
};

export type ConversionStartedEvent = BaseEvent & {
  type: 'conversion.started';
  payload: {
    inputName: string;
    rowsRead: number;
  };
};

export type ConversionProgressEvent = BaseEvent & {
  type: 'conversion.progress';
  payload: {
    entitiesProduced: number;
    rowsProcessed: number;
    rowsRead: number;
  };
};

export type ConversionCompletedEvent = BaseEvent & {
  type: 'conversion.completed';
  payload: {
    entitiesProduced: number;
    rowsSkipped: number;
    bytesWritten?: number;
  };
};

export type ConversionEvent =
  | ConversionStartedEvent
  | ConversionProgressEvent
  | ConversionCompletedEvent;

export type EventHandler<T extends BaseEvent = BaseEvent> = (event: T) => void | Promise<void>;

export type EventSubscription = {
  /** Unique subscription identifier */
  id: string;
  /** Event type being subscribed to */
  eventType: string;
  /** Wrapped handler registered on the emitter */
  handler: (event: BaseEvent) => void;
  metadata: {
    createdAt: number;
  };
};
