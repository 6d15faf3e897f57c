/**
 * Motivación: centralizar los hooks de reacciones ("message Reaction Add/Remove") para tener un punto único de suscripción y emisión.
 *
 * Idea/concepto: envuelve la utilería createEventHook para exponer on/once/off/emit/clear tipados.
 *
 * Alcance: administra listeners del evento; no aplica reglas de negocio asociadas al mismo.
 */
import type { ResolveEventParams } from "seyfert";

import { createEventHook } from "@/events/hooks/createEventHook";

export type MessageReactionAddArgs = ResolveEventParams<"messageReactionAdd">;
export type MessageReactionAddListener = (
  ...args: MessageReactionAddArgs
) => Promise<void> | void;

const addHook = createEventHook<MessageReactionAddArgs>({
  name: "messageReactionAdd",
});

export const onMessageReactionAdd = addHook.on;
export const onceMessageReactionAdd = addHook.once;
export const offMessageReactionAdd = addHook.off;
export const emitMessageReactionAdd = addHook.emit;
export const clearMessageReactionAddListeners = addHook.clear;

export type MessageReactionRemoveArgs = ResolveEventParams<"messageReactionRemove">;
export type MessageReactionRemoveListener = (
  ...args: MessageReactionRemoveArgs
) => Promise<void> | void;

const removeHook = createEventHook<MessageReactionRemoveArgs>({
  name: "messageReactionRemove",
});

export const onMessageReactionRemove = removeHook.on;
export const onceMessageReactionRemove = removeHook.once;
export const offMessageReactionRemove = removeHook.off;
export const emitMessageReactionRemove = removeHook.emit;
export const clearMessageReactionRemoveListeners = removeHook.clear;
