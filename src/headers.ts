import type { RequestHandler } from "express";
import onHeaders from "on-headers";

/**
 * Headers required for cross-origin isolation (`SharedArrayBuffer`, high
 * resolution timers), plus allow-all CORS so the files can be embedded by
 * pages on other origins.
 */
export const ISOLATION_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Cross-Origin-Opener-Policy": "same-origin",
  "Cross-Origin-Embedder-Policy": "require-corp",
} as const;

/**
 * Express middleware that stamps {@link ISOLATION_HEADERS} onto every
 * response, whatever its status or method.
 *
 * The headers are written from a hook that runs as the response head is
 * finalized, after every later middleware (static files, directory listing,
 * the final 404/500 handler) has set or cleared its own headers. A header of
 * the same name set earlier is replaced, so each appears exactly once.
 */
export function isolationHeaders(): RequestHandler {
  return (_req, res, next) => {
    onHeaders(res, () => {
      for (const [name, value] of Object.entries(ISOLATION_HEADERS)) {
        res.setHeader(name, value);
      }
    });
    next();
  };
}
