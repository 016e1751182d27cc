/**
 * Multi-subscriber event stream with a terminal completion.
 *
 * Observers are called synchronously, in subscription order, for every
 * emitted event. The stream can also be consumed with `for await`, which
 * buffers events until the consumer pulls them.
 */

export interface EventObserver<T> {
  next?(event: T): void;
  complete?(): void;
}

export interface EventStream<T> extends AsyncIterable<T> {
  /**
   * Subscribe to events. Subscribing after completion calls `complete`
   * immediately.
   * @returns a function that removes the subscription
   */
  subscribe(observer: EventObserver<T> | ((event: T) => void)): () => void;
  isCompleted(): boolean;
}

export interface EventSource<T> {
  readonly stream: EventStream<T>;
  /** Deliver an event to every observer. No-op once completed. */
  emit(event: T): void;
  /** Complete the stream. Idempotent. */
  complete(): void;
  subscriberCount(): number;
}

export interface EventSourceOptions {
  /** Called when an observer throws; the remaining observers still run. */
  onObserverError?: (error: unknown) => void;
}

interface StreamState<T> {
  observers: Set<EventObserver<T>>;
  completed: boolean;
}

export function createEventSource<T>(
  options: EventSourceOptions = {}
): EventSource<T> {
  const state: StreamState<T> = {
    observers: new Set(),
    completed: false,
  };

  const report = (error: unknown): void => {
    if (options.onObserverError) {
      options.onObserverError(error);
    } else {
      console.error("Event observer threw:", error);
    }
  };

  function subscribe(
    observerOrNext: EventObserver<T> | ((event: T) => void)
  ): () => void {
    // Wrap so the same observer object can subscribe more than once
    const observer: EventObserver<T> =
      typeof observerOrNext === "function"
        ? { next: observerOrNext }
        : {
            next: (event) => observerOrNext.next?.(event),
            complete: () => observerOrNext.complete?.(),
          };

    if (state.completed) {
      try {
        observer.complete?.();
      } catch (err) {
        report(err);
      }
      return () => {};
    }

    state.observers.add(observer);
    return () => {
      state.observers.delete(observer);
    };
  }

  function iterate(): AsyncIterator<T> {
    const buffer: T[] = [];
    const waiters: Array<(result: IteratorResult<T>) => void> = [];
    let done = false;

    const finish = (): void => {
      done = true;
      for (const waiter of waiters.splice(0)) {
        waiter({ value: undefined, done: true });
      }
    };

    const unsubscribe = subscribe({
      next(event) {
        const waiter = waiters.shift();
        if (waiter) {
          waiter({ value: event, done: false });
        } else {
          buffer.push(event);
        }
      },
      complete: finish,
    });

    return {
      next(): Promise<IteratorResult<T>> {
        if (buffer.length > 0) {
          const [event] = buffer.splice(0, 1);
          return Promise.resolve({ value: event, done: false });
        }
        if (done) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          waiters.push(resolve);
        });
      },
      return(): Promise<IteratorResult<T>> {
        unsubscribe();
        buffer.length = 0;
        finish();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  const stream: EventStream<T> = {
    subscribe,
    isCompleted: () => state.completed,
    [Symbol.asyncIterator]: iterate,
  };

  return {
    stream,

    emit(event) {
      if (state.completed) return;
      for (const observer of [...state.observers]) {
        try {
          observer.next?.(event);
        } catch (err) {
          report(err);
        }
      }
    },

    complete() {
      if (state.completed) return;
      state.completed = true;
      const observers = [...state.observers];
      state.observers.clear();
      for (const observer of observers) {
        try {
          observer.complete?.();
        } catch (err) {
          report(err);
        }
      }
    },

    subscriberCount: () => state.observers.size,
  };
}
