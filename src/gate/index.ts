export {
  CommentCommand,
  parseCommentCommand,
  shouldEvaluatePullRequest,
} from "./commands.js";
export { evaluatePullRequest } from "./evaluator.js";
export {
  cancelClaLabel,
  handleCommentEvent,
  handlePullRequestEvent,
} from "./handlers.js";
export { PullRequestAction, PullRequestState } from "./types.js";
export type {
  CommentEvent,
  EvaluationOutcome,
  EvaluationStatus,
  GateDependencies,
  PullRequestEvent,
} from "./types.js";
