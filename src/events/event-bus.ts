import type { Event, EventEnvelope, EventPayloadMap, EventType } from "./types.js";

type EventHandler<T extends EventType> = (payload: EventPayloadMap[T]) => void | Promise<void>;
type EnvelopeHandler = (envelope: EventEnvelope) => void | Promise<void>;
type AnyHandler = (event: Event, envelope: EventEnvelope) => void;
type ErrorHandler = (error: unknown) => void;

const isPromiseLike = (value: unknown): value is Promise<void> =>
  value !== null && typeof value === "object" && "then" in value;

export class EventBus {
  private handlers = new Map<EventType, AnyHandler[]>();
  private wildcard: AnyHandler[] = [];
  private pending = new Set<Promise<void>>();
  private asyncErrors: unknown[] = [];
  private sequence = 0;

  private trackPending(result: Promise<void>, onError?: ErrorHandler): void {
    const wrapped = result
      .catch((error) => {
        if (onError) {
          onError(error);
          return;
        }
        this.asyncErrors.push(error);
      })
      .finally(() => {
        this.pending.delete(wrapped);
      });
    this.pending.add(wrapped);
  }

  private register(list: AnyHandler[], handler: AnyHandler, onEmpty?: () => void): () => void {
    list.push(handler);
    return (): void => {
      const index = list.indexOf(handler);
      if (index >= 0) {
        list.splice(index, 1);
      }
      if (list.length === 0) {
        onEmpty?.();
      }
    };
  }

  private listFor(type: EventType): AnyHandler[] {
    const existing = this.handlers.get(type);
    if (existing) {
      return existing;
    }
    const created: AnyHandler[] = [];
    this.handlers.set(type, created);
    return created;
  }

  private invoke(result: void | Promise<void>, onError?: ErrorHandler): void {
    if (isPromiseLike(result)) {
      this.trackPending(result, onError);
    }
  }

  subscribe<T extends EventType>(type: T, handler: EventHandler<T>): () => void {
    const wrapped: AnyHandler = (event): void => {
      if (event.type === type) {
        this.invoke(handler(event.payload as EventPayloadMap[T]));
      }
    };
    return this.register(this.listFor(type), wrapped, () => this.handlers.delete(type));
  }

  /** Like subscribe, but handler failures go to onError instead of the emitter. */
  subscribeSafe<T extends EventType>(
    type: T,
    handler: EventHandler<T>,
    onError?: ErrorHandler
  ): () => void {
    const wrapped: AnyHandler = (event): void => {
      if (event.type !== type) {
        return;
      }
      try {
        this.invoke(handler(event.payload as EventPayloadMap[T]), onError);
      } catch (error) {
        onError?.(error);
      }
    };
    return this.register(this.listFor(type), wrapped, () => this.handlers.delete(type));
  }

  /** Receives every event wrapped in a sequenced envelope, in emission order. */
  subscribeAll(handler: EnvelopeHandler, onError?: ErrorHandler): () => void {
    const wrapped: AnyHandler = (_event, envelope): void => {
      try {
        this.invoke(handler(envelope), onError);
      } catch (error) {
        if (!onError) {
          throw error;
        }
        onError(error);
      }
    };
    return this.register(this.wildcard, wrapped);
  }

  emit(event: Event): void {
    this.sequence += 1;
    const envelope: EventEnvelope = {
      type: event.type,
      version: 1,
      sequence: this.sequence,
      emitted_at: new Date().toISOString(),
      payload: event.payload
    };
    const handlers = [...(this.handlers.get(event.type) ?? []), ...this.wildcard];
    handlers.forEach((handler) => handler(event, envelope));
  }

  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending));
    }
    if (this.asyncErrors.length > 0) {
      const errors = this.asyncErrors.splice(0);
      throw new AggregateError(errors, "EventBus async handlers failed");
    }
  }
}
