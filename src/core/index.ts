export * from "./interfaces";
export * from "./errors";
export * from "./tar-utils";
export * from "./logger";
export * from "./node";
export * from "./digest";
