export * from "./types/script";
export * from "./runtime/errors";
export * from "./runtime/coordinates";
export * from "./runtime/pixels";
export * from "./runtime/captureCache";
export * from "./runtime/resolution";
export * from "./runtime/worker";
export * from "./runtime/pool";
export * from "./runtime/artifacts";
export * from "./script/commands";
export * from "./script/expression";
export * from "./script/script";
export * from "./script/codec";
export * from "./rpc/contracts";
export * from "./rpc/adbClient";
export * from "./config/defaults";
export * from "./logging/logger";
export * from "./cli/commands";
