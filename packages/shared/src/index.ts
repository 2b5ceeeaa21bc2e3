export * from "./records";
export * from "./schema";
