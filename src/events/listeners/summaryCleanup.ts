/**
 * Cuando se borra un mensaje de resumen, el item queda sin referencia y puede
 * volver a publicarse con el mismo link.
 */
import type { UsingClient } from "seyfert";
import { onMessageDelete } from "@/events/hooks/messageDelete";
import { messageContext, type DeletedMessagePayload } from "@/modules/ratings/payloads";

onMessageDelete(async (message: DeletedMessagePayload, client: UsingClient) => {
  const context = messageContext(message);
  if (!context) return;

  const item = await client.ratings.router.handleSummaryDeleted(message.id, context);
  if (item) {
    client.logger.info("[ratings] summary deleted; item can be posted again", {
      ...context,
      itemId: item.itemId,
      messageId: message.id,
    });
  }
});
