/**
 * Motivación: tener un mini event-emitter tipado por evento de Seyfert.
 *
 * Idea/concepto: cada hook guarda sus listeners y expone on/once/off/emit/clear.
 * `emit` ejecuta todos los listeners en paralelo; el fallo de uno se loguea y no
 * impide que corran los demás.
 *
 * Alcance: infraestructura de eventos; no conoce reglas de negocio.
 */
export type HookListener<Args extends unknown[]> = (
  ...args: Args
) => Promise<void> | void;

export interface EventHookOptions {
  /** Nombre usado en los logs de error. */
  name?: string;
}

export interface EventHook<Args extends unknown[]> {
  /** Registra un listener permanente. Devuelve una función para removerlo. */
  on(listener: HookListener<Args>): () => void;
  /** Registra un listener de única ejecución. */
  once(listener: HookListener<Args>): () => void;
  off(listener: HookListener<Args>): void;
  emit(...args: Args): Promise<void>;
  clear(): void;
  readonly size: number;
}

export function createEventHook<Args extends unknown[]>(
  options: EventHookOptions = {},
): EventHook<Args> {
  const label = options.name ?? "hook";
  const listeners = new Set<HookListener<Args>>();

  const off = (listener: HookListener<Args>): void => {
    listeners.delete(listener);
  };

  const on = (listener: HookListener<Args>): (() => void) => {
    listeners.add(listener);
    return () => off(listener);
  };

  const once = (listener: HookListener<Args>): (() => void) => {
    const wrapped: HookListener<Args> = async (...args) => {
      off(wrapped);
      await listener(...args);
    };
    return on(wrapped);
  };

  const emit = async (...args: Args): Promise<void> => {
    const results = await Promise.allSettled(
      Array.from(listeners, async (listener) => listener(...args)),
    );
    for (const result of results) {
      if (result.status === "rejected") {
        console.error(`[${label}] listener failed:`, result.reason);
      }
    }
  };

  return {
    on,
    once,
    off,
    emit,
    clear: () => listeners.clear(),
    get size() {
      return listeners.size;
    },
  };
}
