/**
 * Motivación: conectar las reacciones de Discord con el motor de ratings.
 *
 * Idea/concepto: traduce el payload a `ReactionEvent` y delega en el router, que
 * devuelve siempre un estado terminal. Aquí solo se loguea ese estado.
 *
 * Alcance: sin reglas de negocio; la validación, dedupe y refresco viven en
 * `@/modules/ratings/router`.
 */
import type { UsingClient } from "seyfert";
import { onMessageReactionAdd, onMessageReactionRemove } from "@/events/hooks/messageReaction";
import { toReactionEvent, type ReactionPayload } from "@/modules/ratings/payloads";

onMessageReactionAdd(async (payload: ReactionPayload, client: UsingClient) => {
  const event = toReactionEvent(payload, client.botId);
  if (!event) return;

  try {
    const outcome = await client.ratings.router.handleReactionAdd(event);
    client.logger.debug("[ratings] reaction add", { messageId: event.messageId, state: outcome.state });
  } catch (error) {
    client.logger.error("[ratings] reaction add handler crashed", {
      error,
      messageId: event.messageId,
      userId: event.userId,
    });
  }
});

onMessageReactionRemove(async (payload: ReactionPayload, client: UsingClient) => {
  const event = toReactionEvent(payload, client.botId);
  if (!event) return;

  try {
    const outcome = await client.ratings.router.handleReactionRemove(event);
    client.logger.debug("[ratings] reaction remove", { messageId: event.messageId, state: outcome.state });
  } catch (error) {
    client.logger.error("[ratings] reaction remove handler crashed", {
      error,
      messageId: event.messageId,
      userId: event.userId,
    });
  }
});
