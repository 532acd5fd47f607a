/**
 * Server configuration: defaults, validation and path resolution.
 *
 * The resolved {@link ServerConfig} is frozen and handed to the listener and
 * the static handler; nothing reads configuration from globals after startup.
 */

import { resolve } from "node:path";
import { z } from "zod";
import { StartupError } from "./errors.js";

export const DEFAULT_PORT = 8080;
export const DEFAULT_CERT_FILE = "cert.pem";
export const DEFAULT_KEY_FILE = "key.pem";

export interface ServerConfig {
  readonly port: number;
  /** Absolute path of the PEM certificate chain. */
  readonly certPath: string;
  /** Absolute path of the PEM private key. */
  readonly keyPath: string;
  /** Absolute path of the served directory. */
  readonly root: string;
  readonly directoryListing: boolean;
}

const PORT_RANGE_MESSAGE = "port must be between 0 and 65535";

const PortSchema = z.preprocess(
  (value) =>
    typeof value === "string" && /^\s*\d+\s*$/.test(value)
      ? Number(value)
      : value,
  z
    .number({ invalid_type_error: "port must be a number" })
    .int("port must be an integer")
    .min(0, PORT_RANGE_MESSAGE)
    .max(65535, PORT_RANGE_MESSAGE),
);

const ServerOptionsSchema = z.object({
  port: PortSchema.default(DEFAULT_PORT),
  cert: z.string().min(1, "cert must not be empty").default(DEFAULT_CERT_FILE),
  key: z.string().min(1, "key must not be empty").default(DEFAULT_KEY_FILE),
  root: z.string().min(1, "root must not be empty").optional(),
  directoryListing: z.boolean().default(true),
});

/** Overrides accepted by {@link resolveConfig}; port may be given as a string. */
export type ServerOptions = Omit<z.input<typeof ServerOptionsSchema>, "port"> & {
  port?: number | string;
};

/**
 * Fill defaults, validate, and resolve relative paths against `cwd`.
 * @throws {StartupError} of kind `config` listing every invalid field
 */
export function resolveConfig(
  options: ServerOptions = {},
  cwd: string = process.cwd(),
): ServerConfig {
  const parsed = ServerOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    );
    throw new StartupError(
      "config",
      `Invalid configuration: ${problems.join("; ")}`,
      { cause: parsed.error },
    );
  }

  const { port, cert, key, root, directoryListing } = parsed.data;
  return Object.freeze({
    port,
    certPath: resolve(cwd, cert),
    keyPath: resolve(cwd, key),
    root: resolve(cwd, root ?? "."),
    directoryListing,
  });
}
