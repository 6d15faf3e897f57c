/**
 * Puente de "messageReactionRemove": solo los eventos de guild llegan a los hooks; el bot no
 * trabaja por mensaje directo.
 */
import { createEvent } from "seyfert";
import { emitMessageReactionRemove } from "@/events/hooks/messageReaction";

export default createEvent({
  data: { name: "messageReactionRemove" },
  async run(reaction, client, shardId) {
    if (!reaction.guildId) return;
    await emitMessageReactionRemove(reaction, client, shardId);
  },
});
