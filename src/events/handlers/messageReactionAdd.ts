/**
 * Puente de "messageReactionAdd": solo los eventos de guild llegan a los hooks; el bot no
 * trabaja por mensaje directo.
 */
import { createEvent } from "seyfert";
import { emitMessageReactionAdd } from "@/events/hooks/messageReaction";

export default createEvent({
  data: { name: "messageReactionAdd" },
  async run(reaction, client, shardId) {
    if (!reaction.guildId) return;
    await emitMessageReactionAdd(reaction, client, shardId);
  },
});
