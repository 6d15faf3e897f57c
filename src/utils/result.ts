/**
 * Resultado tipado para operaciones que pueden fallar.
 *
 * Encaje en el sistema:
 * - Los repositorios (`src/db/repositories`) y el motor de ratings devuelven `Result` en vez de
 *   lanzar, para que un fallo de Mongo o de Discord no tumbe el handler del evento.
 * - `Ok(null)` significa "no hay dato"; `Err(error)` significa "la operación falló".
 *
 * Contrato:
 * - Antes de leer `.value` / `.error` el caller debe estrechar con `isOk()` / `isErr()`.
 * - No existe `unwrap()` sobre `Err`: el compilador obliga a manejar la rama de error.
 *
 * Ejemplo:
 * ```ts
 * const res = await store.statsFor(itemId, context);
 * if (res.isErr()) return ErrResult(res.error);
 * const stats = res.value;
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  readonly ok = true;
  readonly err = false;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }

  unwrapOr(_fallback: T): T {
    return this.value;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return new Ok<U, E>(fn(this.value));
  }
}

export class Err<T, E> {
  readonly ok = false;
  readonly err = true;

  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }

  unwrapOr(fallback: T): T {
    return fallback;
  }

  map<U>(_fn: (value: T) => U): Result<U, E> {
    return new Err<U, E>(this.error);
  }
}

/** Crea un resultado exitoso. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

/** Crea un resultado fallido. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err(error);

/** Normaliza cualquier valor capturado en un `catch` a `Error`. */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
