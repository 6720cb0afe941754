import crypto from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import {
  handleCommentEvent,
  handlePullRequestEvent,
} from "../gate/handlers.js";
import type { EvaluationOutcome, GateDependencies } from "../gate/types.js";
import { describeError } from "../logging/logger.js";
import {
  commentEventFromPayload,
  pullRequestEventFromPayload,
} from "../platform/github-events.js";

export interface WebhookOptions {
  readonly deps: GateDependencies;
  /** When set, `X-Hub-Signature-256` must match the request body. */
  readonly secret?: string;
}

const MAX_BODY_BYTES = 5 * 1024 * 1024;

export async function handleWebhook(
  req: IncomingMessage,
  res: ServerResponse,
  options: WebhookOptions,
): Promise<boolean> {
  const url = new URL(req.url ?? "/", "http://localhost");
  const method = req.method ?? "GET";

  if (url.pathname === "/healthz") {
    respondJson(res, 200, { status: "ok" });
    return true;
  }
  if (url.pathname !== "/webhook") {
    return false;
  }
  if (method !== "POST") {
    respondJson(res, 405, { error: "Method not allowed" });
    return true;
  }

  let body: Buffer;
  try {
    body = await readBody(req);
  } catch (error) {
    respondJson(res, 413, { error: describeError(error) });
    return true;
  }

  if (
    options.secret &&
    !verifySignature(body, options.secret, req.headers["x-hub-signature-256"])
  ) {
    respondJson(res, 401, { error: "Invalid signature" });
    return true;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body.toString("utf8"));
  } catch {
    respondJson(res, 400, { error: "Invalid JSON payload" });
    return true;
  }

  const eventName = headerValue(req.headers["x-github-event"]);
  const outcome = await dispatchEvent(eventName, payload, options.deps);
  respondJson(res, 200, {
    handled: outcome.status !== "ignored",
    outcome,
  });
  return true;
}

export async function dispatchEvent(
  eventName: string,
  payload: unknown,
  deps: GateDependencies,
): Promise<EvaluationOutcome> {
  if (eventName === "pull_request" || eventName === "pull_request_target") {
    const event = pullRequestEventFromPayload(payload);
    if (event) {
      return await handlePullRequestEvent(event, deps);
    }
  }
  if (eventName === "issue_comment") {
    const event = commentEventFromPayload(payload);
    if (event) {
      return await handleCommentEvent(event, deps);
    }
  }
  deps.logger.debug(`Ignoring ${eventName || "unnamed"} event`);
  return { status: "ignored", names: [] };
}

export function signPayload(body: Buffer | string, secret: string): string {
  const digest = crypto.createHmac("sha256", secret).update(body).digest("hex");
  return `sha256=${digest}`;
}

export function verifySignature(
  body: Buffer,
  secret: string,
  header: string | string[] | undefined,
): boolean {
  const received = headerValue(header);
  if (!received) {
    return false;
  }
  const expected = Buffer.from(signPayload(body, secret));
  const actual = Buffer.from(received);
  return (
    expected.length === actual.length &&
    crypto.timingSafeEqual(expected, actual)
  );
}

async function readBody(req: IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new Error("Payload too large");
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks);
}

function headerValue(value: string | string[] | undefined): string {
  if (Array.isArray(value)) {
    return value[0] ?? "";
  }
  return value ?? "";
}

function respondJson(
  res: ServerResponse,
  status: number,
  payload: unknown,
): void {
  res.statusCode = status;
  res.setHeader("content-type", "application/json; charset=utf-8");
  res.end(JSON.stringify(payload));
}
