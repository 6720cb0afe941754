import { getOctokit } from "@actions/github";
import { describe, expect, it } from "vitest";
import { GitHubPlatform } from "../../src/platform/github-platform.js";
import { pr } from "../helpers/fakes.js";

type Route = (method: string, pathname: string) => Response;

function json(status: number, payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function createPlatform(route: Route) {
  const requests: string[] = [];
  const fetch = async (input: string | URL, init?: RequestInit) => {
    const url = new URL(String(input));
    const method = init?.method ?? "GET";
    requests.push(`${method} ${url.pathname}`);
    return route(method, url.pathname);
  };
  const client = getOctokit("test-token", { request: { fetch } });
  return { platform: new GitHubPlatform(client), requests };
}

function commitEntry(index: number) {
  const person = { name: `dev${index}`, email: `dev${index}@example.com` };
  return { sha: `sha${index}`, commit: { author: person, committer: person } };
}

const PULL_PATH = "/repos/org1/repo1/pulls/7";

describe("github commits", () => {
  it("maps a missing author to an empty identity", async () => {
    const { platform } = createPlatform((_method, pathname) =>
      pathname === PULL_PATH
        ? json(200, { number: 7, commits: 1 })
        : json(200, [
            {
              sha: "abc",
              commit: {
                author: null,
                committer: { name: "web-flow", email: "noreply@example.com" },
              },
            },
          ]),
    );

    await expect(platform.listCommits(pr)).resolves.toEqual([
      {
        authorName: "",
        authorEmail: "",
        committerName: "web-flow",
        committerEmail: "noreply@example.com",
      },
    ]);
  });

  it("rejects when the commit list is truncated", async () => {
    const { platform, requests } = createPlatform((_method, pathname) =>
      pathname === PULL_PATH
        ? json(200, { number: 7, commits: 300 })
        : json(
            200,
            Array.from({ length: 250 }, (_, index) => commitEntry(index)),
          ),
    );

    await expect(platform.listCommits(pr)).rejects.toThrow(
      "Fetched 250 of 300 commits on org1/repo1#7",
    );
    expect(requests).toEqual([
      `GET ${PULL_PATH}`,
      `GET ${PULL_PATH}/commits`,
    ]);
  });

  it("returns every commit when the count matches", async () => {
    const { platform } = createPlatform((_method, pathname) =>
      pathname === PULL_PATH
        ? json(200, { number: 7, commits: 2 })
        : json(200, [commitEntry(1), commitEntry(2)]),
    );

    const commits = await platform.listCommits(pr);
    expect(commits.map((commit) => commit.authorEmail)).toEqual([
      "dev1@example.com",
      "dev2@example.com",
    ]);
  });
});

describe("github labels", () => {
  it("treats a missing label as already removed", async () => {
    const { platform, requests } = createPlatform(() =>
      json(404, { message: "Label does not exist" }),
    );

    await expect(platform.removeLabel(pr, "cla/yes")).resolves.toBeUndefined();
    expect(requests).toEqual([
      "DELETE /repos/org1/repo1/issues/7/labels/cla%2Fyes",
    ]);
  });

  it("rejects other removal failures", async () => {
    const { platform } = createPlatform(() =>
      json(500, { message: "Server Error" }),
    );

    await expect(platform.removeLabel(pr, "cla/yes")).rejects.toMatchObject({
      status: 500,
    });
  });
});

describe("github permissions", () => {
  function platformWith(permission: string, roleName: string) {
    return createPlatform(() =>
      json(200, {
        permission,
        role_name: roleName,
        user: { login: "someone" },
      }),
    ).platform;
  }

  it("denies read and triage collaborators", async () => {
    await expect(
      platformWith("read", "triage").hasWritePermission(pr, "someone"),
    ).resolves.toBe(false);
    await expect(
      platformWith("read", "read").hasWritePermission(pr, "someone"),
    ).resolves.toBe(false);
  });

  it("allows write, maintain and admin collaborators", async () => {
    await expect(
      platformWith("write", "write").hasWritePermission(pr, "someone"),
    ).resolves.toBe(true);
    await expect(
      platformWith("write", "maintain").hasWritePermission(pr, "someone"),
    ).resolves.toBe(true);
    await expect(
      platformWith("admin", "admin").hasWritePermission(pr, "someone"),
    ).resolves.toBe(true);
  });
});
