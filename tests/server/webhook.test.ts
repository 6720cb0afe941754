import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { startServer, type ServerHandle } from "../../src/server/index.js";
import { signPayload } from "../../src/server/webhook.js";
import {
  commit,
  createDeps,
  FakePlatform,
  MapChecker,
} from "../helpers/fakes.js";

const SECRET = "test-secret";

const pullRequestPayload = JSON.stringify({
  action: "opened",
  repository: { name: "repo1", owner: { login: "org1" } },
  pull_request: { number: 7, state: "open" },
});

let server: ServerHandle;
let platform: FakePlatform;
let baseUrl: string;

beforeEach(async () => {
  platform = new FakePlatform();
  platform.commits = [commit("Alice", "alice@example.com")];
  const checker = new MapChecker({ "alice@example.com": "yes" });
  server = await startServer({
    port: 0,
    secret: SECRET,
    deps: createDeps(platform, checker),
  });
  baseUrl = `http://localhost:${server.port}`;
});

afterEach(async () => {
  await server.close();
});

function post(event: string, body: string, signature: string) {
  return fetch(`${baseUrl}/webhook`, {
    method: "POST",
    headers: {
      "content-type": "application/json",
      "x-github-event": event,
      "x-hub-signature-256": signature,
    },
    body,
  });
}

describe("webhook server", () => {
  it("evaluates signed pull request events", async () => {
    const response = await post(
      "pull_request",
      pullRequestPayload,
      signPayload(pullRequestPayload, SECRET),
    );
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      handled: true,
      outcome: { status: "pass", names: ["Alice"] },
    });
    expect(platform.labels).toEqual(["cla/yes"]);
  });

  it("rejects requests with a bad signature", async () => {
    const response = await post(
      "pull_request",
      pullRequestPayload,
      signPayload(pullRequestPayload, "other-secret"),
    );
    expect(response.status).toBe(401);
    expect(platform.calls).toEqual([]);
  });

  it("reports unrelated events as unhandled", async () => {
    const body = JSON.stringify({ zen: "Keep it logically awesome." });
    const response = await post("ping", body, signPayload(body, SECRET));
    expect(await response.json()).toEqual({
      handled: false,
      outcome: { status: "ignored", names: [] },
    });
  });

  it("rejects invalid JSON", async () => {
    const body = "{not json";
    const response = await post("pull_request", body, signPayload(body, SECRET));
    expect(response.status).toBe(400);
  });

  it("serves health and method checks", async () => {
    const health = await fetch(`${baseUrl}/healthz`);
    expect(await health.json()).toEqual({ status: "ok" });

    const wrongMethod = await fetch(`${baseUrl}/webhook`);
    expect(wrongMethod.status).toBe(405);

    const missing = await fetch(`${baseUrl}/elsewhere`);
    expect(missing.status).toBe(404);
  });
});
