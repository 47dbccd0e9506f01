export * from "./card";
export * from "./combination";
export * from "./state";
