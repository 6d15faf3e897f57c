/**
 * Puente de "messageDelete": solo los eventos de guild llegan a los hooks; el bot no
 * trabaja por mensaje directo.
 */
import { createEvent } from "seyfert";
import { emitMessageDelete } from "@/events/hooks/messageDelete";

export default createEvent({
  data: { name: "messageDelete" },
  async run(message, client, shardId) {
    if (!message.guildId) return;
    await emitMessageDelete(message, client, shardId);
  },
});
