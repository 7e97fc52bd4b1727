export * from "./bot";
export { BaseAdapter } from "./adapters/adapter";
export { AdapterRegistry } from "./adapters/registry";
export { ShellAdapter, SHELL_CHANNEL, type ShellAdapterConfig } from "./adapters/shell/adapter";
export type { Adapter, AdapterStatus, Sender } from "./adapters/types";
export { loadConfig, resolveConfigPath, type ChatmuxConfig, type ConfigLoadResult } from "./config";
export * from "./handlers";
export { BotHost, type BotHostOptions, type BotHostStatus } from "./host";
export { configureLogger, logger, type LogLevel } from "./logger";
export { HttpServer, type HttpServerConfig } from "./server/http-server";
export { APP_VERSION } from "./version";
