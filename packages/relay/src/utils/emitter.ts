/**
 * Minimal typed event emitter.
 *
 * Handlers are called over a snapshot of the registration list, so
 * (un)registering during emit only affects later emits. A throwing handler
 * does not stop the remaining handlers; its error goes to `onHandlerError`.
 */

export type EventMap = Record<string, unknown[]>;

export interface Emitter<E extends EventMap> {
  on<K extends keyof E>(event: K, handler: (...args: E[K]) => void): () => void;
  emit<K extends keyof E>(event: K, ...args: E[K]): void;
  clear(event?: keyof E): void;
  count(event?: keyof E): number;
}

export type HandlerErrorReporter = (error: unknown, event: string) => void;

type HandlerLists<E extends EventMap> = {
  [K in keyof E]?: readonly ((...args: E[K]) => void)[];
};

const reportToConsole: HandlerErrorReporter = (error, event) => {
  console.error(`[RealtimeRelay] Event handler for '${event}' threw:`, error);
};

export function createEmitter<E extends EventMap>(
  onHandlerError: HandlerErrorReporter = reportToConsole,
): Emitter<E> {
  let handlers: HandlerLists<E> = {};

  return {
    on(event, handler) {
      // Lists are replaced, never mutated, so an in-flight emit keeps its snapshot
      handlers[event] = [...(handlers[event] ?? []), handler];
      let disposed = false;
      return () => {
        if (disposed) return;
        disposed = true;
        handlers[event] = (handlers[event] ?? []).filter((h) => h !== handler);
      };
    },

    emit(event, ...args) {
      const snapshot = handlers[event] ?? [];
      for (const handler of snapshot) {
        try {
          handler(...args);
        } catch (error) {
          onHandlerError(error, String(event));
        }
      }
    },

    clear(event) {
      if (event === undefined) {
        handlers = {};
        return;
      }
      delete handlers[event];
    },

    count(event) {
      if (event !== undefined) {
        return handlers[event]?.length ?? 0;
      }
      let total = 0;
      for (const key in handlers) {
        total += handlers[key]?.length ?? 0;
      }
      return total;
    },
  };
}
