import { request as httpRequest, type IncomingHttpHeaders } from "node:http";
import { request as httpsRequest } from "node:https";
import { connect as tlsConnect } from "node:tls";

export interface TestResponse {
  status: number;
  headers: IncomingHttpHeaders;
  /** Alternating name/value pairs exactly as received. */
  rawHeaders: string[];
  body: Buffer;
  text: string;
}

export interface TestRequest {
  port: number;
  path: string;
  method?: string;
  headers?: Record<string, string>;
  /** Talk TLS to the server (self-signed certificates are accepted). */
  tls?: boolean;
}

/**
 * One request on a fresh connection. The path is sent verbatim, so
 * `/../x` reaches the server without being normalized.
 */
export function send({
  port,
  path,
  method = "GET",
  headers = {},
  tls = false,
}: TestRequest): Promise<TestResponse> {
  const options = {
    host: "127.0.0.1",
    port,
    path,
    method,
    headers,
    agent: false as const,
  };

  return new Promise<TestResponse>((resolve, reject) => {
    const req = tls
      ? httpsRequest({ ...options, rejectUnauthorized: false })
      : httpRequest(options);
    req.on("response", (res) => {
      const chunks: Buffer[] = [];
      res.on("data", (chunk: Buffer) => chunks.push(chunk));
      res.on("error", reject);
      res.on("end", () => {
        const body = Buffer.concat(chunks);
        resolve({
          status: res.statusCode ?? 0,
          headers: res.headers,
          rawHeaders: res.rawHeaders,
          body,
          text: body.toString("utf-8"),
        });
      });
    });
    req.on("error", reject);
    req.end();
  });
}

/** How many times a header appears in the response, case-insensitively. */
export function headerCount(res: TestResponse, name: string): number {
  const wanted = name.toLowerCase();
  return res.rawHeaders.filter(
    (value, index) => index % 2 === 0 && value.toLowerCase() === wanted,
  ).length;
}

/**
 * Write `payload` over a fresh TLS connection and collect everything the
 * server sends back until it closes the connection.
 */
export function sendRawTls(port: number, payload: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    const socket = tlsConnect(
      { host: "127.0.0.1", port, rejectUnauthorized: false },
      () => {
        socket.write(payload);
      },
    );
    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    socket.on("error", reject);
    socket.on("close", () => resolve(Buffer.concat(chunks).toString("latin1")));
  });
}
