/**
 * Central export point for all library modules
 */

export * from "./types";
export * from "./errors";
export * from "./descriptors";
export * from "./resolver";
export * from "./type-text";
export * from "./coercion";
export * from "./matcher";
export * from "./prompts";
export * from "./retry";
export * from "./signature";
export * from "./config";
export * from "./audit";
export * from "./logger";
export * from "./utils";
export * from "./providers/types";
export * from "./providers/base";
export * from "./providers/openai";
export * from "./providers/gemini";
export * from "./providers/registry";
