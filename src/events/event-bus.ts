import type { Event, EventOf, EventPayload, EventType } from "./types.js";

export type EventHandler<T extends EventType> = (payload: EventPayload<T>) => void | Promise<void>;
export type BusListener = (event: Event) => void | Promise<void>;
export type ListenerErrorHandler = (error: unknown, event: Event) => void;

type Registration = {
  /** `null` listens to every event type. */
  type: EventType | null;
  listener: BusListener;
  /** Isolated listeners never throw into `emit`. */
  isolated: boolean;
  onError?: ListenerErrorHandler;
};

const isEventOf = <T extends EventType>(event: Event, type: T): event is EventOf<T> => event.type === type;

const isThenable = (value: unknown): value is PromiseLike<void> =>
  typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";

/**
 * Fan-out of orchestration events to in-process listeners.
 *
 * A plain `subscribe` listener that throws fails the `emit` call, and with it
 * the orchestration that emitted; the error reaches the caller as thrown.
 * `subscribeSafe` and `subscribeAll` listeners report failures to their own
 * handler instead. Rejections from async listeners without a handler are held
 * until `flush`.
 */
export class EventBus {
  private registrations: Registration[] = [];
  private inFlight = new Set<Promise<void>>();
  private rejections: Array<{ type: EventType; error: unknown }> = [];

  subscribe<T extends EventType>(type: T, handler: EventHandler<T>): () => void {
    return this.add({
      type,
      listener: (event) => (isEventOf(event, type) ? handler(event.payload) : undefined),
      isolated: false
    });
  }

  subscribeSafe<T extends EventType>(
    type: T,
    handler: EventHandler<T>,
    onError?: ListenerErrorHandler
  ): () => void {
    return this.add({
      type,
      listener: (event) => (isEventOf(event, type) ? handler(event.payload) : undefined),
      isolated: true,
      onError
    });
  }

  /** Receives every event in emission order; failures go to `onError`. */
  subscribeAll(listener: BusListener, onError?: ListenerErrorHandler): () => void {
    return this.add({ type: null, listener, isolated: true, onError });
  }

  emit(event: Event): void {
    const targets = this.registrations.filter(
      (registration) => registration.type === null || registration.type === event.type
    );
    for (const registration of targets) {
      let result: void | Promise<void> = undefined;
      try {
        result = registration.listener(event);
      } catch (error) {
        if (!registration.isolated) {
          throw error;
        }
        registration.onError?.(error, event);
        continue;
      }
      if (isThenable(result)) {
        this.track(result, event, registration.onError);
      }
    }
  }

  /** Waits for async listeners; throws once for every rejection nobody handled. */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }
    if (this.rejections.length === 0) {
      return;
    }
    const rejections = this.rejections.splice(0);
    const types = Array.from(new Set(rejections.map((rejection) => rejection.type)));
    throw new AggregateError(
      rejections.map((rejection) => rejection.error),
      `Async event listeners failed for ${types.join(", ")}`
    );
  }

  private add(registration: Registration): () => void {
    this.registrations.push(registration);
    return (): void => {
      this.registrations = this.registrations.filter((entry) => entry !== registration);
    };
  }

  private track(result: PromiseLike<void>, event: Event, onError: ListenerErrorHandler | undefined): void {
    const settled: Promise<void> = Promise.resolve(result)
      .then(undefined, (error: unknown) => {
        if (onError) {
          onError(error, event);
        } else {
          this.rejections.push({ type: event.type, error });
        }
      })
      .finally(() => {
        this.inFlight.delete(settled);
      });
    this.inFlight.add(settled);
  }
}
