export {
  renderAllSignedComment,
  renderNeedSignComment,
  renderUserMarks,
} from "./comment-renderer.js";
export {
  isGuidanceComment,
  removeGuidanceComments,
} from "./guidance-cleanup.js";
export { postComment, reconcileVerdict } from "./reconciler.js";
export type { ReconcileContext, ReconcileResult } from "./reconciler.js";
