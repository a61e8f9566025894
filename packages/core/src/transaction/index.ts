export * from "./endpoint";
export * from "./phase-signal";
export * from "./transaction";
export * from "./transaction.client";
export * from "./transaction.errors";
export * from "./transaction.types";
