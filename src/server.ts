import http from "http";
import type { RequestGateway } from "./application/gateway/RequestGateway";
import { asPipelineError, type PipelineErrorCode } from "./core/errors/PipelineError";
import type { Logger } from "./shared/logging/logger";
import { silentLogger } from "./shared/logging/logger";

export type GatewayApi = Pick<RequestGateway, "request" | "requestFromText" | "status" | "cancel" | "health">;

const maxBodyBytes = 64 * 1024;

const statusByCode: Partial<Record<PipelineErrorCode, number>> = {
  InvalidSource: 400,
  UnsupportedFormat: 400,
  JobNotFound: 404,
  QueueFull: 429,
  QueueClosed: 503,
  StorageFull: 507
};

class BadRequestError extends Error {
  constructor(
    message: string,
    readonly closeConnection = false
  ) {
    super(message);
  }
}

const sendJson = (res: http.ServerResponse, status: number, body: unknown, headers: http.OutgoingHttpHeaders = {}) => {
  res.writeHead(status, { "content-type": "application/json", ...headers });
  res.end(JSON.stringify(body));
};

const sendError = (
  res: http.ServerResponse,
  status: number,
  code: string,
  message: string,
  headers?: http.OutgoingHttpHeaders
) => sendJson(res, status, { error: { code, message } }, headers);

/**
 * An oversized body is drained without buffering and answered once the client
 * has finished sending it.
 */
const readJsonBody = (req: http.IncomingMessage): Promise<unknown> =>
  new Promise((resolve, reject) => {
    let size = 0;
    let oversized = false;
    const chunks: Buffer[] = [];
    const onData = (chunk: Buffer) => {
      size += chunk.length;
      if (size > maxBodyBytes) {
        oversized = true;
        chunks.length = 0;
        req.off("data", onData);
        req.resume();
        return;
      }
      chunks.push(chunk);
    };
    req.on("data", onData);
    req.on("end", () => {
      if (oversized) {
        reject(new BadRequestError(`Request body exceeds ${maxBodyBytes} bytes`, true));
        return;
      }
      try {
        resolve(JSON.parse(Buffer.concat(chunks).toString("utf8")));
      } catch {
        reject(new BadRequestError("Request body must be valid JSON"));
      }
    });
    req.on("error", reject);
  });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

type SubmissionOptions = { bitrateKbps?: number; referer?: string };

type Submission =
  | ({ kind: "url"; url: string; format: string } & SubmissionOptions)
  | ({ kind: "text"; text: string; format: string } & SubmissionOptions);

const parseSubmission = (body: unknown): Submission => {
  if (!isRecord(body)) throw new BadRequestError("Body must be a JSON object");
  const { url, text, format, bitrateKbps, referer } = body;
  if (typeof format !== "string" || format.trim() === "") throw new BadRequestError("format must be a non-empty string");
  const options: SubmissionOptions = {};
  if (typeof bitrateKbps === "number") options.bitrateKbps = bitrateKbps;
  else if (bitrateKbps != null) throw new BadRequestError("bitrateKbps must be a number");
  if (typeof referer === "string") options.referer = referer;
  else if (referer != null) throw new BadRequestError("referer must be a string");

  if (typeof text === "string" && url == null) {
    if (text.trim() === "") throw new BadRequestError("text must be a non-empty string");
    return { kind: "text", text, format, ...options };
  }
  if (typeof url !== "string" || url.trim() === "") throw new BadRequestError("url must be a non-empty string");
  return { kind: "url", url, format, ...options };
};

/**
 * JSON transport over the gateway:
 * GET /health, POST /jobs (`url` or free `text`, optional `referer`), GET /jobs/:id, DELETE /jobs/:id
 */
export const createServer = (gateway: GatewayApi, logger: Logger = silentLogger) => {
  const route = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const { pathname } = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";

    if (pathname === "/health" && method === "GET") {
      const health = gateway.health();
      return sendJson(res, health.accepting ? 200 : 503, health);
    }

    if (pathname === "/jobs" && method === "POST") {
      const submission = parseSubmission(await readJsonBody(req));
      const options = { bitrateKbps: submission.bitrateKbps, referer: submission.referer };
      if (submission.kind === "text") {
        return sendJson(res, 202, gateway.requestFromText(submission.text, submission.format, options));
      }
      const jobId = gateway.request(submission.url, submission.format, options);
      return sendJson(res, 202, { jobId });
    }

    const jobMatch = /^\/jobs\/([A-Za-z0-9_-]+)$/.exec(pathname);
    if (jobMatch && method === "GET") {
      const job = await gateway.status(jobMatch[1]);
      if (!job) return sendError(res, 404, "JobNotFound", `Job ${jobMatch[1]} not found`);
      return sendJson(res, 200, job);
    }
    if (jobMatch && method === "DELETE") {
      return sendJson(res, 200, await gateway.cancel(jobMatch[1]));
    }

    return sendError(res, 404, "NOT_FOUND", `Route ${method} ${pathname} not found`);
  };

  return http.createServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      if (err instanceof BadRequestError) {
        return sendError(res, 400, "BadRequest", err.message, err.closeConnection ? { connection: "close" } : {});
      }
      const error = asPipelineError(err);
      const status = statusByCode[error.code] ?? 500;
      if (status === 500) {
        logger.error("http.unhandled_error", { method: req.method, url: req.url, message: error.message });
      }
      return sendError(res, status, error.code, error.message);
    });
  });
};
