export * from "./validation";
export * from "./auth";
export * from "./games";
