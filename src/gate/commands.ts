import {
  PullRequestAction,
  PullRequestState,
  type PullRequestEvent,
} from "./types.js";

const CHECK_CLA_COMMAND = /^\s*\/check-cla\s*$/i;
const CANCEL_CLA_COMMAND = /^\s*\/cla cancel\s*$/i;

export const enum CommentCommand {
  CheckCla = "check-cla",
  CancelCla = "cla-cancel",
  None = "none",
}

export function parseCommentCommand(comment: string): CommentCommand {
  if (CHECK_CLA_COMMAND.test(comment)) {
    return CommentCommand.CheckCla;
  }
  if (CANCEL_CLA_COMMAND.test(comment)) {
    return CommentCommand.CancelCla;
  }
  return CommentCommand.None;
}

/** PR creation or a push to its source branch. */
export function shouldEvaluatePullRequest(event: PullRequestEvent): boolean {
  if (event.state !== PullRequestState.Opened) {
    return false;
  }
  return (
    event.action === PullRequestAction.Open ||
    event.action === PullRequestAction.Update
  );
}
