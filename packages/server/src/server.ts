/**
 * HTTP server
 *
 * Thin node:http transport around handleRequest. Requests share nothing
 * but the read-only config.
 */

import { createServer, type IncomingMessage, type Server } from "http";
import { handleRequest, type HandlerContext, type HttpRequest } from "./handlers.js";

/** Largest form body accepted */
const MAX_BODY_BYTES = 64 * 1024;

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error("Request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

export async function toHttpRequest(req: IncomingMessage): Promise<HttpRequest> {
  const url = new URL(req.url ?? "/", "http://localhost");
  return {
    method: req.method ?? "GET",
    path: url.pathname,
    body: req.method === "POST" ? await readBody(req) : "",
  };
}

export function createReportServer(context: HandlerContext): Server {
  return createServer((req, res) => {
    toHttpRequest(req)
      .then((request) => handleRequest(request, context))
      .then((response) => {
        res.writeHead(response.statusCode, response.headers);
        res.end(response.body);
      })
      .catch((error: unknown) => {
        console.error("Request failed:", error);
        if (!res.headersSent) {
          res.writeHead(500, { "Content-Type": "text/plain; charset=utf-8" });
        }
        res.end("Sorry, something went wrong");
      });
  });
}

/**
 * Start listening on the configured port
 */
export function startServer(context: HandlerContext): Promise<Server> {
  const server = createReportServer(context);
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(context.config.port, () => {
      console.log(`Listening... Go to http://localhost:${context.config.port}`);
      resolve(server);
    });
  });
}
