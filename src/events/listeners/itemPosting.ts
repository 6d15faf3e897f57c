/**
 * Motivación: publicar un resumen calificable cuando alguien comparte un link de IMDb.
 *
 * Flujo:
 * 1. Ignora bots, DMs y mensajes sin link de título.
 * 2. `engine.publishItem` decide: POSTED, ALREADY-POSTED o FAILED.
 * 3. Si hubo publicación (o ya existía), borra el mensaje original para que el
 *    canal quede con un único resumen por título.
 */
import type { UsingClient } from "seyfert";
import { onMessageCreate } from "@/events/hooks/messageCreate";
import { parseItemLink } from "@/modules/ratings/links";
import { messageContext, type PostedMessagePayload } from "@/modules/ratings/payloads";
import { alreadyPostedNotice } from "@/modules/ratings/views";

onMessageCreate(async (message: PostedMessagePayload, client: UsingClient) => {
  if (message.author.bot) return;

  const context = messageContext(message);
  if (!context) return;

  const link = parseItemLink(message.content);
  if (!link) return;

  const outcome = await client.ratings.publishItem(link, context, message.author.id);
  if (outcome.state === "FAILED") return;

  if (outcome.state === "ALREADY-POSTED") {
    await client.ratings.router.notify(context, alreadyPostedNotice(link.itemId));
  }

  try {
    await client.messages.delete(message.id, message.channelId);
  } catch (error) {
    client.logger.warn("[ratings] could not delete the link message", {
      error,
      ...context,
      messageId: message.id,
    });
  }
});
