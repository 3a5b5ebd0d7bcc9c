// /src/contracts/index.ts
/**
 * Contracts - single source of truth for shapes shared across lib/ modules.
 */

export * from "./candidate";
export * from "./records";
export * from "./evaluation";
