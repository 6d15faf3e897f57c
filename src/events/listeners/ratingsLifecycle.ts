/**
 * Arranque del motor de ratings al quedar listo el bot: índices, timers y un
 * snapshot inicial en el log.
 */
import { onBotReady } from "@/events/hooks/botReady";
import { ratingStore, trackedItemStore } from "@/db/repositories";

onBotReady(async (_user, client) => {
  try {
    await ratingStore.ensureIndexes();
    await trackedItemStore.ensureIndexes();
  } catch (error) {
    client.logger.error("[ratings] failed to ensure indexes", { error });
  }

  client.ratings.start();

  const total = await client.ratings.service.countRatings();
  client.logger.info("[ratings] engine ready", {
    ...client.ratings.snapshot(),
    storedRatings: total.unwrapOr(-1),
  });
});
