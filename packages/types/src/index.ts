export * from "./auth";
export * from "./driver";
export * from "./order";
export * from "./realtime";
export * from "./security";
