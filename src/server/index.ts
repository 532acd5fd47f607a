/**
 * HTTPS listener for the static file handler.
 *
 * Reads the certificate/key pair, builds the TLS context and binds all
 * interfaces on `config.port`. Anything that prevents serving is reported as
 * a {@link StartupError} before the returned promise settles; failures after
 * that stay confined to their connection or request.
 */

import { stat, readFile } from "node:fs/promises";
import { createServer, type Server } from "node:https";
import type { Duplex } from "node:stream";
import { createStaticApp } from "../app.js";
import type { ServerConfig } from "../config.js";
import { StartupError, describeError } from "../errors.js";
import { ISOLATION_HEADERS } from "../headers.js";
import { createLogger, type Logger } from "../log.js";

export interface StartServerOptions {
  /** Logger for the listener and the request log. */
  logger?: Logger;
}

export interface RunningServer {
  server: Server;
  /** Bound port; differs from `config.port` when that was `0`. */
  port: number;
  url: string;
  /** Stop listening and drop open connections. */
  close(): Promise<void>;
}

async function readPem(
  kind: "certificate" | "key",
  path: string,
): Promise<Buffer> {
  try {
    return await readFile(path);
  } catch (error) {
    throw new StartupError(
      kind,
      `Cannot read ${kind} file ${path}: ${describeError(error)}`,
      { path, cause: error },
    );
  }
}

async function checkRoot(root: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(root)).isDirectory();
  } catch (error) {
    throw new StartupError(
      "root",
      `Cannot serve ${root}: ${describeError(error)}`,
      { path: root, cause: error },
    );
  }
  if (!isDirectory) {
    throw new StartupError("root", `Cannot serve ${root}: not a directory`, {
      path: root,
    });
  }
}

/**
 * Reply Node sends for requests it cannot parse (bad request line, unknown
 * method, oversized headers). Such requests never reach express, so the
 * isolation headers are written here.
 */
export function clientErrorResponse(code: string | undefined): string {
  const status =
    code === "HPE_HEADER_OVERFLOW"
      ? "431 Request Header Fields Too Large"
      : "400 Bad Request";
  const headers = Object.entries(ISOLATION_HEADERS).map(
    ([name, value]) => `${name}: ${value}\r\n`,
  );
  return `HTTP/1.1 ${status}\r\n${headers.join("")}Connection: close\r\n\r\n`;
}

function listen(server: Server, port: number): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const onError = (error: NodeJS.ErrnoException) => {
      server.off("listening", onListening);
      const reason =
        error.code === "EADDRINUSE"
          ? "port already in use"
          : error.code === "EACCES"
            ? "permission denied"
            : describeError(error);
      reject(
        new StartupError("listen", `Cannot listen on port ${port}: ${reason}`, {
          port,
          cause: error,
        }),
      );
    };
    const onListening = () => {
      server.off("error", onError);
      const address = server.address();
      resolve(typeof address === "object" && address ? address.port : port);
    };

    server.once("error", onError);
    server.once("listening", onListening);
    // No host: bind every interface
    server.listen(port);
  });
}

/**
 * Start serving `config.root` over HTTPS.
 * @throws {StartupError} when the certificate, key, root or port is unusable
 */
export async function startServer(
  config: ServerConfig,
  options: StartServerOptions = {},
): Promise<RunningServer> {
  const log = options.logger ?? createLogger("Server");

  const [cert, key] = await Promise.all([
    readPem("certificate", config.certPath),
    readPem("key", config.keyPath),
  ]);
  await checkRoot(config.root);

  const app = createStaticApp(config, { logger: options.logger });

  let server: Server;
  try {
    server = createServer({ cert, key }, app);
  } catch (error) {
    throw new StartupError(
      "tls",
      `Invalid TLS credentials (${config.certPath}, ${config.keyPath}): ${describeError(error)}`,
      { path: config.certPath, cause: error },
    );
  }

  server.on("tlsClientError", (error, socket) => {
    log.warn(
      `TLS handshake failed from ${socket.remoteAddress ?? "unknown"}: ${describeError(error)}`,
    );
  });

  server.on("clientError", (error: NodeJS.ErrnoException, socket: Duplex) => {
    if (error.code === "ECONNRESET" || !socket.writable) {
      socket.destroy();
      return;
    }
    log.warn(`Malformed request: ${describeError(error)}`);
    socket.end(clientErrorResponse(error.code));
  });

  const port = await listen(server, config.port);

  return {
    server,
    port,
    url: `https://localhost:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      }),
  };
}
