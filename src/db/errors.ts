/**
 * Clasificación de errores del driver de MongoDB.
 */
import { MongoServerError } from "mongodb";

export const DUPLICATE_KEY = 11000;

/** E11000: otro writer insertó el mismo `_id` primero. */
export const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof MongoServerError && error.code === DUPLICATE_KEY;
