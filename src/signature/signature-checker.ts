import { isRecord } from "../config/config-validator.js";
import type { SignatureChecker } from "./types.js";

export interface HttpSignatureCheckerOptions {
  readonly checkUrl: string;
  readonly timeoutMs?: number;
  readonly fetch?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Signature service client. Issues `GET <checkUrl>?email=<email>` and
 * returns the service's `sign_state` token (top level or under `data`), or
 * the trimmed body when the response is not JSON.
 */
export class HttpSignatureChecker implements SignatureChecker {
  private readonly checkUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpSignatureCheckerOptions) {
    this.checkUrl = options.checkUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async checkSignature(email: string): Promise<string> {
    const url = new URL(this.checkUrl);
    url.searchParams.set("email", email);

    const response = await this.fetchImpl(url, {
      method: "GET",
      headers: { accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      await response.body?.cancel();
      throw new Error(
        `Signature service responded ${response.status} for ${url.origin}${url.pathname}`,
      );
    }

    const body = await response.text();
    return extractSignState(body);
  }
}

export function extractSignState(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body.trim();
  }
  if (!isRecord(parsed)) {
    return typeof parsed === "string" ? parsed : "";
  }
  const direct = parsed.sign_state;
  if (typeof direct === "string") {
    return direct;
  }
  const data = parsed.data;
  if (isRecord(data) && typeof data.sign_state === "string") {
    return data.sign_state;
  }
  return "";
}

export function createHttpChecker(policy: {
  readonly check_url: string;
}): SignatureChecker {
  return new HttpSignatureChecker({ checkUrl: policy.check_url });
}
