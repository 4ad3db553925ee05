export * from "./binary/index.ts";
export * from "./compression/index.ts";
export * from "./document/index.ts";
export * from "./layers/index.ts";
export { consoleLogger, createMemoryLogger, type Logger } from "./log.ts";
export * from "./patterns/index.ts";
export * from "./resources/index.ts";
export * from "./tagged/index.ts";
