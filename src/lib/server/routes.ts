import { ConversionError, describeCause, isConversionError, NotFoundError, UnsupportedFormatError } from "../errors";
import type { ConversionService, Download } from "../service";
import { getSupportedExtensions } from "../utils/file-utils";

export const SESSION_COOKIE = "session_id";

export interface ApiRequest {
  method: string;
  /** Path plus query string, as it arrives on the request line. */
  url: string;
  cookies: Record<string, string>;
  body: Buffer;
}

export interface ApiResponse {
  status: number;
  headers: Record<string, string>;
  body: string | Buffer;
}

const STATUS_BY_CODE: Record<ConversionError["code"], number> = {
  NOT_FOUND: 404,
  UNSUPPORTED_FORMAT: 400,
  INVALID_STATE_TRANSITION: 400,
  NOTHING_TO_ARCHIVE: 400,
  FILE_TOO_LARGE: 413,
  SESSION_QUOTA_EXCEEDED: 413,
  EXTRACTION_ERROR: 422,
};

export function statusFor(err: unknown): number {
  return isConversionError(err) ? STATUS_BY_CODE[err.code] : 500;
}

function json(status: number, data: unknown, headers: Record<string, string> = {}): ApiResponse {
  return {
    status,
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(data),
  };
}

export function errorResponse(err: unknown): ApiResponse {
  const status = statusFor(err);
  if (isConversionError(err)) {
    return json(status, { error: err.code, message: err.message });
  }
  console.error(`[serve] Unexpected error: ${describeCause(err)}`);
  return json(status, { error: "INTERNAL", message: describeCause(err) });
}

function attachment(download: Download): ApiResponse {
  const safeName = download.filename.replace(/["\\\r\n]/g, "_");
  return {
    status: 200,
    headers: {
      "Content-Type": download.contentType,
      "Content-Disposition": `attachment; filename="${safeName}"`,
      "Content-Length": String(download.body.length),
    },
    body: download.body,
  };
}

export function sessionCookie(sessionId: string, ttlMs: number): string {
  return `${SESSION_COOKIE}=${sessionId}; Path=/; HttpOnly; SameSite=Lax; Max-Age=${Math.floor(ttlMs / 1000)}`;
}

export function parseCookies(header: string | undefined): Record<string, string> {
  const cookies: Record<string, string> = {};
  if (!header) return cookies;
  for (const part of header.split(";")) {
    const eq = part.indexOf("=");
    if (eq <= 0) continue;
    const name = part.slice(0, eq).trim();
    const value = part.slice(eq + 1).trim();
    try {
      cookies[name] = decodeURIComponent(value);
    } catch {
      cookies[name] = value;
    }
  }
  return cookies;
}

function readFormat(body: Buffer): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString("utf-8"));
  } catch {
    parsed = undefined;
  }
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "format" in parsed &&
    typeof parsed.format === "string"
  ) {
    return parsed.format;
  }
  throw new UnsupportedFormatError('Request body must be {"format": "markdown" | "json"}');
}

/**
 * Routes one request against the service. Has no access to the socket, so it
 * can be driven directly from tests.
 */
export async function handleRequest(
  service: ConversionService,
  req: ApiRequest,
): Promise<ApiResponse> {
  const method = req.method.toUpperCase();
  const token = req.cookies[SESSION_COOKIE];

  const requireSession = (): string => {
    if (!token || !service.store.has(token)) {
      throw new NotFoundError("session", token ?? "(none)");
    }
    return token;
  };

  try {
    const url = new URL(req.url, "http://localhost");
    const route = url.pathname.replace(/\/+$/, "") || "/";

    if (method === "GET" && route === "/health") {
      return json(200, { status: "ok" });
    }

    if (method === "GET" && route === "/api/session") {
      const handle = await service.createOrResumeSession(token);
      return json(
        200,
        {
          sessionId: handle.sessionId,
          files: handle.files,
          limits: service.limits,
          supportedExtensions: getSupportedExtensions(),
        },
        { "Set-Cookie": sessionCookie(handle.sessionId, service.store.ttl) },
      );
    }

    if (method === "POST" && route === "/api/upload") {
      const filename = url.searchParams.get("filename");
      if (!filename) {
        throw new UnsupportedFormatError("Missing ?filename= query parameter");
      }
      const handle = await service.createOrResumeSession(token);
      const file = await service.uploadFile(handle.sessionId, filename, req.body);
      return json(
        200,
        { file },
        { "Set-Cookie": sessionCookie(handle.sessionId, service.store.ttl) },
      );
    }

    if (method === "GET" && route === "/api/files") {
      return json(200, { files: await service.listFiles(requireSession()) });
    }

    if (method === "DELETE" && route === "/api/clear") {
      await service.clearSession(requireSession());
      return json(200, { cleared: true });
    }

    if (method === "POST" && route === "/api/convert") {
      const results = await service.convertAll(requireSession());
      return json(200, { results });
    }

    if (method === "GET" && route === "/api/download-all") {
      return attachment(await service.downloadArchive(requireSession()));
    }

    const fileRoute = /^\/api\/files\/([^/]+)(?:\/(format|preview|download))?$/.exec(route);
    if (fileRoute) {
      const fileId = decodeURIComponent(fileRoute[1]);
      const action = fileRoute[2];
      if (method === "DELETE" && action === undefined) {
        await service.deleteFile(requireSession(), fileId);
        return json(200, { deleted: fileId });
      }
      if (method === "POST" && action === "format") {
        const format = readFormat(req.body);
        const file = await service.setOutputFormat(requireSession(), fileId, format);
        return json(200, { file });
      }
      if (method === "GET" && action === "preview") {
        return json(200, await service.getFilePreview(requireSession(), fileId));
      }
      if (method === "GET" && action === "download") {
        return attachment(await service.downloadFile(requireSession(), fileId));
      }
    }

    return json(404, { error: "NOT_FOUND", message: `No route for ${method} ${route}` });
  } catch (err) {
    return errorResponse(err);
  }
}
