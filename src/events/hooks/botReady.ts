/**
 * Motivación: centralizar el hook del evento "bot Ready" para tener un punto único de suscripción y emisión.
 *
 * Alcance: administra listeners del evento; no aplica reglas de negocio asociadas al mismo.
 */
import type { ResolveEventParams } from "seyfert";
import { createEventHook } from "@/events/hooks/createEventHook";

/** Parametros tipados que Seyfert provee al evento `botReady`. */
export type BotReadyArgs = ResolveEventParams<"botReady">;
export type BotReadyListener = (...args: BotReadyArgs) => Promise<void> | void;

const readyHook = createEventHook<BotReadyArgs>({ name: "botReady" });

/** Registra un listener permanente para `botReady`. */
export const onBotReady = readyHook.on;
/** Registra un listener de unica ejecucion para `botReady`. */
export const onceBotReady = readyHook.once;
export const offBotReady = readyHook.off;
/** Ejecuta todos los listeners registrados propagando los datos originales del evento. */
export const emitBotReady = readyHook.emit;
export const clearBotReadyListeners = readyHook.clear;
