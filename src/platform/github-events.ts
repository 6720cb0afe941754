import { isRecord } from "../config/config-validator.js";
import {
  PullRequestState,
  type CommentEvent,
  type PullRequestEvent,
} from "../gate/types.js";

const ACTION_ALIASES = new Map<string, string>([
  ["opened", "open"],
  ["reopened", "open"],
  ["synchronize", "update"],
]);

/**
 * Normalize a `pull_request` or `pull_request_target` webhook payload.
 * Returns null when the payload does not describe a pull request.
 */
export function pullRequestEventFromPayload(
  payload: unknown,
): PullRequestEvent | null {
  if (!isRecord(payload) || !isRecord(payload.pull_request)) {
    return null;
  }
  const repository = repositoryOf(payload);
  const pullRequest = payload.pull_request;
  if (!repository || typeof pullRequest.number !== "number") {
    return null;
  }

  const rawAction = typeof payload.action === "string" ? payload.action : "";
  return {
    ...repository,
    number: pullRequest.number,
    state: normalizeState(pullRequest),
    action: ACTION_ALIASES.get(rawAction) ?? rawAction,
  };
}

/**
 * Normalize an `issue_comment` payload. Only newly created comments on pull
 * requests are relevant.
 */
export function commentEventFromPayload(payload: unknown): CommentEvent | null {
  if (!isRecord(payload) || payload.action !== "created") {
    return null;
  }
  const issue = payload.issue;
  const comment = payload.comment;
  if (!isRecord(issue) || !isRecord(comment)) {
    return null;
  }
  if (!isRecord(issue.pull_request) || typeof issue.number !== "number") {
    return null;
  }
  const repository = repositoryOf(payload);
  if (!repository) {
    return null;
  }

  const user = comment.user;
  const commenter =
    isRecord(user) && typeof user.login === "string" ? user.login : "";
  return {
    ...repository,
    number: issue.number,
    comment: typeof comment.body === "string" ? comment.body : "",
    commenter,
  };
}

function repositoryOf(
  payload: Record<string, unknown>,
): { org: string; repo: string } | null {
  const repository = payload.repository;
  if (!isRecord(repository) || typeof repository.name !== "string") {
    return null;
  }
  const owner = repository.owner;
  if (!isRecord(owner) || typeof owner.login !== "string") {
    return null;
  }
  return { org: owner.login, repo: repository.name };
}

function normalizeState(pullRequest: Record<string, unknown>): string {
  if (pullRequest.merged === true) {
    return PullRequestState.Merged;
  }
  if (pullRequest.state === "open") {
    return PullRequestState.Opened;
  }
  return typeof pullRequest.state === "string" ? pullRequest.state : "";
}
