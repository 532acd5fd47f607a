export { createStaticApp, type StaticAppOptions } from "./app.js";
export {
  DEFAULT_CERT_FILE,
  DEFAULT_KEY_FILE,
  DEFAULT_PORT,
  resolveConfig,
  type ServerConfig,
  type ServerOptions,
} from "./config.js";
export {
  StartupError,
  isStartupError,
  type StartupErrorKind,
} from "./errors.js";
export { ISOLATION_HEADERS, isolationHeaders } from "./headers.js";
export { createLogger, type Logger } from "./log.js";
export {
  startServer,
  type RunningServer,
  type StartServerOptions,
} from "./server/index.js";
