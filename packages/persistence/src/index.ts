export * from "./idempotency";
export * from "./state";
