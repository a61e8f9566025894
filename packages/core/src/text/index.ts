export * from "./text-exchange";
