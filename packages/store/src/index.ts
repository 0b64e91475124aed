export { parseConfig, loadConfig, DEFAULT_DATA_DIR_NAME, type StoreConfig } from "./config";
export { createLogger, type LogLevel, type Logger, type LogSink } from "./logger";
export { DirectoryTextFiles } from "./files";
export { createLineHandler } from "./server";
