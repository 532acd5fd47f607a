/**
 * Errors raised while bringing the server up.
 *
 * Per-request failures never surface here: express maps them to 403/404/500
 * responses, and TLS handshake failures are logged and dropped by the listener.
 */

export type StartupErrorKind =
  | "config"
  | "certificate"
  | "key"
  | "tls"
  | "root"
  | "listen";

export interface StartupErrorDetails {
  /** File or directory the failure relates to. */
  path?: string;
  /** Port the listener tried to bind. */
  port?: number;
  cause?: unknown;
}

/** Fatal error: the server never started listening. */
export class StartupError extends Error {
  readonly kind: StartupErrorKind;
  readonly path?: string;
  readonly port?: number;

  constructor(
    kind: StartupErrorKind,
    message: string,
    details: StartupErrorDetails = {},
  ) {
    super(message, { cause: details.cause });
    this.name = "StartupError";
    this.kind = kind;
    this.path = details.path;
    this.port = details.port;
  }
}

export function isStartupError(value: unknown): value is StartupError {
  return value instanceof StartupError;
}

/** Message of an unknown thrown value, with the errno code when there is one. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const code = (error as NodeJS.ErrnoException).code;
    return code && !error.message.includes(code)
      ? `${code}: ${error.message}`
      : error.message;
  }
  return String(error);
}
