import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';
import type { Logger } from '../domain/ports/Logger.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type AnyHandler = (event: any) => void;

/** Typed event bus for request lifecycle events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly handlers = new Map<string, Set<AnyHandler>>();

  constructor(private readonly logger?: Logger) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Set<AnyHandler>();
    existing.add(handler as AnyHandler);
    this.handlers.set(type, existing);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type);
    if (existing) {
      existing.delete(handler as AnyHandler);
    }
  }

  /** Emit an event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type);
    if (!handlers) return;

    for (const handler of handlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger?.warn('Event handler threw', {
          event: event.type,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
