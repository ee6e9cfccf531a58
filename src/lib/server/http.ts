import * as http from "node:http";
import { FileTooLargeError } from "../errors";
import type { ConversionService } from "../service";
import { errorResponse, handleRequest, parseCookies, type ApiResponse } from "./routes";

/**
 * Buffers the request body. Past the limit the rest is read and discarded,
 * so the client is still listening when the 413 goes out.
 */
function readBody(req: http.IncomingMessage, limit: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let overflow = false;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (overflow) return;
      if (size > limit) {
        overflow = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (overflow) reject(new FileTooLargeError(size, limit));
      else resolve(Buffer.concat(chunks));
    });
    req.on("error", reject);
  });
}

function send(res: http.ServerResponse, response: ApiResponse): void {
  res.statusCode = response.status;
  for (const [name, value] of Object.entries(response.headers)) {
    res.setHeader(name, value);
  }
  res.end(response.body);
}

/**
 * Binds the request handler to a node:http server. Bodies larger than the
 * per-file limit are refused with 413 once fully received.
 */
export function createHttpServer(service: ConversionService): http.Server {
  const maxBody = service.limits.maxFileBytes;

  return http.createServer(async (req, res) => {
    let body: Buffer;
    try {
      body = await readBody(req, maxBody);
    } catch (err) {
      if (!res.headersSent) {
        res.setHeader("Connection", "close");
        send(res, errorResponse(err));
      }
      return;
    }
    send(
      res,
      await handleRequest(service, {
        method: req.method ?? "GET",
        url: req.url ?? "/",
        cookies: parseCookies(req.headers.cookie),
        body,
      }),
    );
  });
}
