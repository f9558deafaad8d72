/**
 * @fileoverview In-process publish/subscribe router.
 *
 * Components talk to each other only through the bus, so the turn engine
 * never holds a reference to a renderer, an AI policy or a network bridge.
 *
 * Delivery modes:
 * - `publish`: synchronous, on the caller's stack, in subscription order.
 *   Handler errors propagate to the publisher.
 * - `publishDeferred`: queued in one FIFO queue and delivered one event per
 *   macrotask, for work that must not run on the publisher's stack
 *   (e.g. an AI choosing its move).
 */

/**
 * Base shape of every event: a tagged record.
 */
export interface BusEvent {
  readonly type: string;
}

export type EventHandler<TEvent> = (event: TEvent) => void;

/** Narrow an event union to the member with the given tag. */
export type EventOfType<TEvent extends BusEvent, K extends TEvent['type']> = Extract<
  TEvent,
  { type: K }
>;

/**
 * Error used to reject deferred deliveries once the bus has been cleared.
 */
export class BusClosedError extends Error {
  constructor() {
    super('Event bus has been cleared');
    this.name = 'BusClosedError';
  }
}

/**
 * Error thrown by `waitFor` when no matching event arrives in time.
 */
export class EventTimeoutError extends Error {
  constructor(
    readonly eventType: string,
    readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for ${eventType}`);
    this.name = 'EventTimeoutError';
  }
}

interface Subscription<TEvent> {
  /** Handler as passed by the subscriber, used for unsubscribe. */
  readonly original: unknown;
  readonly deliver: EventHandler<TEvent>;
}

interface DeferredDelivery<TEvent> {
  readonly event: TEvent;
  readonly resolve: () => void;
  readonly reject: (error: unknown) => void;
}

function isEventOfType<TEvent extends BusEvent, K extends TEvent['type']>(
  event: TEvent,
  type: K
): event is EventOfType<TEvent, K> {
  return event.type === type;
}

/**
 * Typed event bus.
 *
 * Subscriber lists are copy-on-write: `publish` iterates the list that was
 * current when it started, so a handler may subscribe or unsubscribe during
 * delivery and the change applies from the next publish.
 *
 * @example
 * ```typescript
 * type GameEvent = { type: 'ping'; n: number } | { type: 'pong' };
 * const bus = new EventBus<GameEvent>();
 *
 * const off = bus.subscribe('ping', (event) => console.log(event.n));
 * bus.publish({ type: 'ping', n: 1 });
 * off();
 * ```
 */
export class EventBus<TEvent extends BusEvent> {
  private readonly subscriptions = new Map<string, readonly Subscription<TEvent>[]>();
  private readonly deferredQueue: DeferredDelivery<TEvent>[] = [];
  private readonly idleWaiters: (() => void)[] = [];
  private drainScheduled = false;
  private cleared = false;

  /**
   * Subscribe to one event type.
   * @returns Function that removes this subscription
   */
  subscribe<K extends TEvent['type']>(
    type: K,
    handler: EventHandler<EventOfType<TEvent, K>>
  ): () => void {
    const subscription: Subscription<TEvent> = {
      original: handler,
      deliver: (event) => {
        if (isEventOfType(event, type)) {
          handler(event);
        }
      },
    };

    const current = this.subscriptions.get(type) ?? [];
    this.subscriptions.set(type, [...current, subscription]);

    return () => {
      this.removeSubscription(type, subscription);
    };
  }

  /**
   * Remove the first subscription of `handler` to `type`.
   * @returns true if a subscription was removed
   */
  unsubscribe<K extends TEvent['type']>(
    type: K,
    handler: EventHandler<EventOfType<TEvent, K>>
  ): boolean {
    const current = this.subscriptions.get(type);
    const subscription = current?.find((s) => s.original === handler);
    if (!subscription) {
      return false;
    }
    this.removeSubscription(type, subscription);
    return true;
  }

  /**
   * Deliver an event to every current subscriber of its type, synchronously.
   * A throwing handler stops delivery and the error reaches the caller.
   */
  publish(event: TEvent): void {
    const snapshot = this.subscriptions.get(event.type);
    if (!snapshot) {
      return;
    }
    for (const subscription of snapshot) {
      subscription.deliver(event);
    }
  }

  /**
   * Queue an event for delivery on a later macrotask.
   * @returns Promise settled once the event was delivered; rejects with the
   *   handler's error, or with BusClosedError if the bus is cleared first
   */
  publishDeferred(event: TEvent): Promise<void> {
    if (this.cleared) {
      return Promise.reject(new BusClosedError());
    }
    return new Promise<void>((resolve, reject) => {
      this.deferredQueue.push({ event, resolve, reject });
      this.scheduleDrain();
    });
  }

  /**
   * Resolve once every deferred event queued so far (and any queued while
   * delivering them) has been delivered.
   */
  drain(): Promise<void> {
    if (!this.drainScheduled && this.deferredQueue.length === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Wait for the next event of a type, optionally matching a predicate.
   * @throws {EventTimeoutError} if `timeoutMs` elapses first
   */
  waitFor<K extends TEvent['type']>(
    type: K,
    predicate: (event: EventOfType<TEvent, K>) => boolean = () => true,
    timeoutMs?: number
  ): Promise<EventOfType<TEvent, K>> {
    return new Promise((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | null = null;

      const off = this.subscribe(type, (event) => {
        if (!predicate(event)) {
          return;
        }
        off();
        if (timer) {
          clearTimeout(timer);
        }
        resolve(event);
      });

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          off();
          reject(new EventTimeoutError(type, timeoutMs));
        }, timeoutMs);
      }
    });
  }

  /**
   * Number of current subscriptions for a type.
   */
  subscriberCount(type: TEvent['type']): number {
    return this.subscriptions.get(type)?.length ?? 0;
  }

  /**
   * Remove every subscription and reject pending deferred deliveries.
   * Deferred publishes after this reject; synchronous publishes reach nobody.
   */
  clear(): void {
    this.cleared = true;
    this.subscriptions.clear();

    const pending = this.deferredQueue.splice(0);
    for (const delivery of pending) {
      delivery.reject(new BusClosedError());
    }
    this.notifyIdle();
  }

  private removeSubscription(type: string, subscription: Subscription<TEvent>): void {
    const current = this.subscriptions.get(type);
    if (!current) {
      return;
    }
    const index = current.indexOf(subscription);
    if (index === -1) {
      return;
    }
    const next = [...current.slice(0, index), ...current.slice(index + 1)];
    if (next.length === 0) {
      this.subscriptions.delete(type);
    } else {
      this.subscriptions.set(type, next);
    }
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) {
      return;
    }
    this.drainScheduled = true;
    setImmediate(() => {
      this.deliverNextDeferred();
    });
  }

  private deliverNextDeferred(): void {
    this.drainScheduled = false;

    const next = this.deferredQueue.shift();
    if (next) {
      try {
        this.publish(next.event);
        next.resolve();
      } catch (error) {
        next.reject(error);
      }
    }

    if (this.deferredQueue.length > 0) {
      this.scheduleDrain();
    } else {
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters.splice(0);
    for (const resolve of waiters) {
      resolve();
    }
  }
}
