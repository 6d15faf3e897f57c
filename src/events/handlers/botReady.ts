/**
 * Motivación: adaptar el evento "bot Ready" de Seyfert para reenviarlo a los hooks internos del bot.
 *
 * Alcance: puente entre Seyfert y el sistema de hooks; no implementa la lógica del evento en sí.
 */
import { createEvent } from "seyfert";
import { emitBotReady } from "@/events/hooks/botReady";

export default createEvent({
  data: { name: "botReady", once: true },
  async run(user, client, shardId) {
    client.logger.info(`${user.username} ready`);
    await emitBotReady(user, client, shardId);
  },
});
