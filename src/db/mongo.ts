/**
 * Mongo client singleton for the native driver.
 * Purpose: single entrypoint to obtain the database handle (`getDb`) and close it (`disconnectDb`).
 *
 * The bootstrap calls `configureDb` with the validated environment before anything
 * touches the database; `getDb` never reads `process.env` itself.
 */
import { MongoClient, type Db } from "mongodb";

export const DEFAULT_DB_NAME = "reel_ratings";

export interface DbSettings {
  uri: string;
  dbName?: string;
}

let settings: Required<DbSettings> | null = null;
let client: MongoClient | null = null;
let dbPromise: Promise<Db> | null = null;

export function configureDb(next: DbSettings): void {
  const uri = next.uri.trim();
  if (!uri) throw new Error("MongoDB URI must not be empty.");
  const dbName = next.dbName?.trim() || DEFAULT_DB_NAME;
  settings = { uri, dbName };
}

/**
 * Returns the shared `Db`. Concurrent callers share the same in-flight connect;
 * a failed connect is forgotten so the next call retries.
 */
export async function getDb(): Promise<Db> {
  if (dbPromise) return dbPromise;
  if (!settings) throw new Error("MongoDB is not configured (configureDb was not called).");

  const { uri, dbName } = settings;
  const mongo = new MongoClient(uri);
  client = mongo;
  dbPromise = mongo
    .connect()
    .then((connected) => connected.db(dbName))
    .catch((error: unknown) => {
      client = null;
      dbPromise = null;
      throw error;
    });
  return dbPromise;
}

export async function disconnectDb(): Promise<void> {
  const current = client;
  client = null;
  dbPromise = null;
  if (current) {
    await current.close();
  }
}
