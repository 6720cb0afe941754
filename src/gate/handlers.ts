import { findRepoPolicy } from "../config/repo-filter.js";
import type { RepoPolicy } from "../config/types.js";
import { describeError } from "../logging/logger.js";
import type { PullRequestRef } from "../platform/types.js";
import { postComment } from "../reconcile/reconciler.js";
import {
  CommentCommand,
  parseCommentCommand,
  shouldEvaluatePullRequest,
} from "./commands.js";
import { evaluatePullRequest } from "./evaluator.js";
import type {
  CommentEvent,
  EvaluationOutcome,
  GateDependencies,
  PullRequestEvent,
} from "./types.js";

const IGNORED: EvaluationOutcome = { status: "ignored", names: [] };

export async function handlePullRequestEvent(
  event: PullRequestEvent,
  deps: GateDependencies,
): Promise<EvaluationOutcome> {
  const policy = resolvePolicy(event, deps);
  if (!policy || !shouldEvaluatePullRequest(event)) {
    return IGNORED;
  }
  return await evaluatePullRequest(toRef(event), policy, deps);
}

export async function handleCommentEvent(
  event: CommentEvent,
  deps: GateDependencies,
): Promise<EvaluationOutcome> {
  const policy = resolvePolicy(event, deps);
  if (!policy) {
    return IGNORED;
  }

  switch (parseCommentCommand(event.comment)) {
    case CommentCommand.CheckCla:
      return await evaluatePullRequest(toRef(event), policy, deps);
    case CommentCommand.CancelCla:
      return await cancelClaLabel(event, policy, deps);
    case CommentCommand.None:
      return IGNORED;
  }
}

/**
 * `/cla cancel`: a commenter with write access withdraws the signed label.
 * The unsigned label is left alone.
 */
export async function cancelClaLabel(
  event: CommentEvent,
  policy: RepoPolicy,
  deps: GateDependencies,
): Promise<EvaluationOutcome> {
  const { platform, logger } = deps;
  const pr = toRef(event);
  const target = `${pr.org}/${pr.repo}#${pr.number}`;

  let permitted: boolean;
  let labels: string[];
  try {
    permitted = await platform.hasWritePermission(pr, event.commenter);
    labels = permitted ? await platform.listLabels(pr) : [];
  } catch (error) {
    logger.warning(
      `Cannot cancel CLA label on ${target}: ${describeError(error)}`,
    );
    return { status: "fetch-failed", names: [] };
  }

  if (!permitted) {
    logger.warning(
      `${event.commenter} lacks permission to cancel the CLA label on ${target}`,
    );
    return { status: "denied", names: [event.commenter] };
  }

  if (!labels.includes(policy.cla_label_yes)) {
    return { status: "cancelled", names: [] };
  }

  try {
    await platform.removeLabel(pr, policy.cla_label_yes);
  } catch (error) {
    const label = policy.cla_label_yes;
    logger.warning(
      `Failed to remove label '${label}' from ${target}: ${describeError(error)}`,
    );
    await postComment(
      { platform, pr },
      deps.config.comment_update_label_failed,
      logger,
    );
  }
  return { status: "cancelled", names: [policy.cla_label_yes] };
}

function resolvePolicy(
  event: { readonly org: string; readonly repo: string },
  deps: GateDependencies,
): RepoPolicy | undefined {
  const policy = findRepoPolicy(deps.config, event.org, event.repo);
  if (!policy) {
    deps.logger.warning(`No config for this repo: ${event.org}/${event.repo}`);
  }
  return policy;
}

function toRef(event: PullRequestRef): PullRequestRef {
  return { org: event.org, repo: event.repo, number: event.number };
}
