import type { FieldErrorDetail } from '../model/ValidationResult.js';

/** Emitted before an endpoint runs. `operation` is the dotted endpoint name, e.g. `record.update`. */
export interface RequestStartedEvent {
  readonly type: 'request:started';
  readonly requestId: string;
  readonly operation: string;
  readonly timestamp: number;
}

/** Emitted when a call produced a successful response. */
export interface RequestCompletedEvent {
  readonly type: 'request:completed';
  readonly requestId: string;
  readonly operation: string;
  readonly statusCode: number;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted when a call produced a failed response, whatever the cause. */
export interface RequestFailedEvent {
  readonly type: 'request:failed';
  readonly requestId: string;
  readonly operation: string;
  readonly statusCode: number | null;
  readonly error: string;
  /** Present only for validation failures. */
  readonly validationErrors?: readonly FieldErrorDetail[];
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent = RequestStartedEvent | RequestCompletedEvent | RequestFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
