import type { CommentTemplates, RepoPolicy } from "../config/types.js";
import type { Commit } from "../contributor/types.js";
import { extractContributors } from "../contributor/contributor-extractor.js";
import { describeError } from "../logging/logger.js";
import type { PullRequestRef } from "../platform/types.js";
import { postComment, reconcileVerdict } from "../reconcile/reconciler.js";
import { aggregateSignStates } from "../signature/aggregator.js";
import { VerdictKind } from "../signature/types.js";
import type { EvaluationOutcome, GateDependencies } from "./types.js";

/**
 * Run one full evaluation of a pull request: fetch commits, resolve
 * identities, aggregate signature states and reconcile labels and comments.
 */
export async function evaluatePullRequest(
  pr: PullRequestRef,
  policy: RepoPolicy,
  deps: GateDependencies,
): Promise<EvaluationOutcome> {
  const { platform, logger } = deps;
  const templates: CommentTemplates = deps.config;
  const target = `${pr.org}/${pr.repo}#${pr.number}`;
  const context = { platform, pr };

  let commits: Commit[];
  try {
    commits = await platform.listCommits(pr);
  } catch (error) {
    logger.warning(
      `Failed to list commits of ${target}: ${describeError(error)}`,
    );
    await postComment(context, templates.comment_command_trigger, logger);
    return { status: "fetch-failed", names: [] };
  }

  if (commits.length === 0) {
    logger.info(`${target} has no commits`);
    await postComment(context, templates.comment_pr_no_commits, logger);
    return { status: "no-commits", names: [] };
  }

  const identities = extractContributors(commits, {
    checkByCommitter: policy.check_by_committer,
  });
  const { verdict } = await aggregateSignStates(
    identities,
    policy,
    deps.createChecker(policy),
    { logger },
  );

  if (verdict.kind === VerdictKind.Pending) {
    const names = verdict.names.join(", ");
    logger.info(`${target} has contributors with unknown CLA state: ${names}`);
    await postComment(context, templates.comment_command_trigger, logger);
    return { status: "pending", names: verdict.names };
  }

  let labels: string[];
  try {
    labels = await platform.listLabels(pr);
  } catch (error) {
    logger.warning(
      `Failed to list labels of ${target}: ${describeError(error)}`,
    );
    await postComment(context, templates.comment_command_trigger, logger);
    return { status: "fetch-failed", names: [] };
  }

  await reconcileVerdict(verdict, labels, {
    platform,
    pr,
    policy,
    templates,
    logger,
  });
  logger.info(`${target} CLA verdict: ${verdict.kind}`);
  return {
    status: verdict.kind === VerdictKind.Pass ? "pass" : "fail",
    names: verdict.names,
  };
}
