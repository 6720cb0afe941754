import type { CommentTemplates } from "../config/types.js";
import { describeError, type GateLogger } from "../logging/logger.js";
import type { Platform, PrComment, PullRequestRef } from "../platform/types.js";

export function isGuidanceComment(
  comment: PrComment,
  templates: CommentTemplates,
): boolean {
  return (
    comment.body.includes(templates.placeholder_cla_sign_guide_title) ||
    comment.body.includes(templates.placeholder_cla_sign_pass_title)
  );
}

/**
 * Delete every earlier guidance comment on the pull request. Best effort:
 * nothing here is reported back to the caller.
 */
export async function removeGuidanceComments(
  platform: Platform,
  pr: PullRequestRef,
  templates: CommentTemplates,
  logger: GateLogger,
): Promise<number> {
  let comments: PrComment[];
  try {
    comments = await platform.listComments(pr);
  } catch (error) {
    logger.debug(`Skipping guidance cleanup: ${describeError(error)}`);
    return 0;
  }

  let deleted = 0;
  for (const comment of comments) {
    if (!isGuidanceComment(comment, templates)) {
      continue;
    }
    try {
      await platform.deleteComment(pr, comment.id);
      deleted++;
    } catch (error) {
      logger.debug(
        `Failed to delete comment ${comment.id}: ${describeError(error)}`,
      );
    }
  }
  return deleted;
}
