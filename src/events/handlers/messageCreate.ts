/**
 * Puente de "messageCreate": solo los eventos de guild llegan a los hooks; el bot no
 * trabaja por mensaje directo.
 */
import { createEvent } from "seyfert";
import { emitMessageCreate } from "@/events/hooks/messageCreate";

export default createEvent({
  data: { name: "messageCreate" },
  async run(message, client, shardId) {
    if (!message.guildId) return;
    await emitMessageCreate(message, client, shardId);
  },
});
