/**
 * Static file handler: an express app serving `config.root`.
 *
 * Middleware order:
 * 1. request log line (on response finish)
 * 2. isolation headers hook
 * 3. CORS
 * 4. `express.static` - files, `index.html`, trailing-slash redirects
 * 5. `serve-index` - directory listings when no index file exists
 * 6. express final handler - 404 / 403 / 500
 */

import cors from "cors";
import express, { type Express, type RequestHandler } from "express";
import serveIndex from "serve-index";
import type { ServerConfig } from "./config.js";
import { isolationHeaders } from "./headers.js";
import { createLogger, type Logger } from "./log.js";

export interface StaticAppOptions {
  /** Receives one `info` line per finished response. */
  logger?: Logger;
}

function requestLog(log: Logger): RequestHandler {
  return (req, res, next) => {
    res.on("finish", () => {
      log.info(`${req.method} ${req.originalUrl} ${res.statusCode}`);
    });
    next();
  };
}

export function createStaticApp(
  config: Pick<ServerConfig, "root" | "directoryListing">,
  options: StaticAppOptions = {},
): Express {
  const log = options.logger ?? createLogger("Http");
  const app = express();

  app.disable("x-powered-by");
  app.use(requestLog(log));
  app.use(isolationHeaders());
  app.use(cors());
  app.use(express.static(config.root));
  if (config.directoryListing) {
    app.use(serveIndex(config.root, { icons: true }));
  }

  return app;
}
