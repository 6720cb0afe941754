import type { CommentTemplates, RepoPolicy } from "../config/types.js";
import {
  describeError,
  silentLogger,
  type GateLogger,
} from "../logging/logger.js";
import type { Platform, PullRequestRef } from "../platform/types.js";
import { VerdictKind, type Verdict } from "../signature/types.js";
import {
  renderAllSignedComment,
  renderNeedSignComment,
} from "./comment-renderer.js";
import { removeGuidanceComments } from "./guidance-cleanup.js";

export interface ReconcileContext {
  readonly platform: Platform;
  readonly pr: PullRequestRef;
  readonly policy: RepoPolicy;
  readonly templates: CommentTemplates;
  readonly logger?: GateLogger;
}

export interface ReconcileResult {
  /** False when the verdict required no action. */
  readonly acted: boolean;
  readonly labelApplied: boolean;
  readonly comments: readonly string[];
}

interface LabelTransition {
  readonly remove: string;
  readonly add: string;
  readonly renderComment: () => string;
}

const NO_ACTION: ReconcileResult = {
  acted: false,
  labelApplied: false,
  comments: [],
};

/**
 * Bring the pull request's CLA labels and guidance comment in line with a
 * verdict. `labels` is the label set read before this call.
 */
export async function reconcileVerdict(
  verdict: Verdict,
  labels: readonly string[],
  context: ReconcileContext,
): Promise<ReconcileResult> {
  const { policy, templates } = context;
  switch (verdict.kind) {
    case VerdictKind.Pass:
      return await applyTransition(labels, context, {
        remove: policy.cla_label_no,
        add: policy.cla_label_yes,
        renderComment: () => renderAllSignedComment(verdict.names, templates),
      });
    case VerdictKind.Fail:
      if (verdict.names.length === 0) {
        return NO_ACTION;
      }
      return await applyTransition(labels, context, {
        remove: policy.cla_label_yes,
        add: policy.cla_label_no,
        renderComment: () =>
          renderNeedSignComment(verdict.names, policy, templates),
      });
    case VerdictKind.Pending:
      return NO_ACTION;
    default: {
      const unreachable: never = verdict;
      return unreachable;
    }
  }
}

async function applyTransition(
  labels: readonly string[],
  context: ReconcileContext,
  transition: LabelTransition,
): Promise<ReconcileResult> {
  const { platform, pr, templates } = context;
  const logger = context.logger ?? silentLogger;
  const comments: string[] = [];
  const post = async (body: string): Promise<void> => {
    comments.push(body);
    await postComment(context, body, logger);
  };

  if (labels.includes(transition.remove)) {
    const removed = await attempt(
      () => platform.removeLabel(pr, transition.remove),
      `remove label '${transition.remove}'`,
      logger,
    );
    if (!removed) {
      await post(templates.comment_update_label_failed);
    }
  }

  const added = await attempt(
    () => platform.addLabels(pr, [transition.add]),
    `add label '${transition.add}'`,
    logger,
  );
  if (!added) {
    await post(templates.comment_update_label_failed);
    return { acted: true, labelApplied: false, comments };
  }

  await removeGuidanceComments(platform, pr, templates, logger);
  await post(transition.renderComment());
  return { acted: true, labelApplied: true, comments };
}

export async function postComment(
  context: Pick<ReconcileContext, "platform" | "pr">,
  body: string,
  logger: GateLogger,
): Promise<boolean> {
  return await attempt(
    () => context.platform.createComment(context.pr, body),
    "create comment",
    logger,
  );
}

async function attempt(
  operation: () => Promise<void>,
  description: string,
  logger: GateLogger,
): Promise<boolean> {
  try {
    await operation();
    return true;
  } catch (error) {
    logger.warning(`Failed to ${description}: ${describeError(error)}`);
    return false;
  }
}
