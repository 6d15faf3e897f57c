/**
 * Motivación: exponer un punto de entrada único para la capa de datos del bot.
 *
 * Alcance: fachada de la capa de persistencia; no agrega lógica adicional.
 */
export * from "./mongo";
export * from "./errors";
export * as RatingSchemas from "./schemas/rating";
export * as TrackedItemSchemas from "./schemas/tracked-item";
export * from "./repositories";
