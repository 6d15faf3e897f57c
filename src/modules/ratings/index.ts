export * from "./types";
export * from "./codec";
export * from "./context";
export * from "./guard";
export * from "./cache";
export * from "./store";
export * from "./service";
export * from "./router";
export * from "./engine";
export * from "./links";
export * from "./views";
export * from "./gateway";
export * from "./logger";
export * from "./payloads";
