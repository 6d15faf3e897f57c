export * from "./ratings";
export * from "./tracked-items";
