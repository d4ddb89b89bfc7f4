export * from "./schemas.js";
export * from "./actions.js";
export type * from "./interfaces.js";
