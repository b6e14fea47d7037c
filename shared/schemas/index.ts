export * from "./candidates";
export * from "./common";
