/**
 * Motivación: punto de arranque del bot; valida el entorno, arma el motor de
 * ratings y registra eventos/listeners de Seyfert.
 *
 * Alcance: orquesta el bootstrap; no contiene reglas de negocio.
 */
import "dotenv/config";

import type { ParseClient } from "seyfert";
import { Client } from "seyfert";
import { loadRatingsConfig } from "@/configuration/env";
import { configureDb, disconnectDb, ratingStore, trackedItemStore } from "@/db";
import {
  SeyfertRatingGateway,
  createRatingEngine,
  createRatingLogger,
  type RatingEngine,
} from "@/modules/ratings";

import { loadedListeners } from "./events/listeners"; // ! Registra los listeners en sus hooks antes de que lleguen eventos

const configRes = loadRatingsConfig();
if (configRes.isErr()) {
  console.error("[bootstrap]", configRes.error.message);
  process.exit(1);
}
const config = configRes.value;
if (!config.botToken || !config.mongoUri) {
  console.error("[bootstrap] Missing BOT_TOKEN or MONGO_URI.");
  process.exit(1);
}
configureDb({ uri: config.mongoUri, dbName: config.dbName });

const client = new Client<true>();
const logger = createRatingLogger(config.logLevel);
const gateway = new SeyfertRatingGateway(client, logger);

client.ratings = createRatingEngine({
  config,
  ratings: ratingStore,
  items: trackedItemStore,
  gateway,
  display: gateway,
  logger,
});

async function shutdown(signal: string): Promise<void> {
  logger.info(`[bootstrap] ${signal} received; shutting down`);
  client.ratings.stop();
  try {
    await disconnectDb();
  } catch (error) {
    logger.error("[bootstrap] failed to close MongoDB", { error });
  }
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}

async function bootstrap(): Promise<void> {
  console.log(`[bootstrap] Starting bot with listeners: ${loadedListeners.join(", ")}`);
  await client.start();
}

bootstrap().catch((error) => {
  console.error("[bootstrap] Failed to start bot:", error);
  process.exitCode = 1;
});

declare module "seyfert" {
  interface UsingClient extends ParseClient<Client<true>> {
    ratings: RatingEngine;
  }
  interface Client<Ready extends boolean = boolean> {
    ratings: RatingEngine;
  }
}
