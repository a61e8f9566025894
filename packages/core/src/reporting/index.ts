export * from "./reporter";
