import type { Commit } from "../contributor/types.js";

export interface PullRequestRef {
  readonly org: string;
  readonly repo: string;
  readonly number: number;
}

export interface PrComment {
  readonly id: number;
  readonly body: string;
}

/**
 * Code-hosting operations the gate depends on. Implementations reject on
 * failure; callers decide which failures are fatal to an evaluation.
 */
export interface Platform {
  listCommits(pr: PullRequestRef): Promise<Commit[]>;
  listLabels(pr: PullRequestRef): Promise<string[]>;
  /** Adding a label that is already present must succeed. */
  addLabels(pr: PullRequestRef, labels: readonly string[]): Promise<void>;
  removeLabel(pr: PullRequestRef, label: string): Promise<void>;
  listComments(pr: PullRequestRef): Promise<PrComment[]>;
  createComment(pr: PullRequestRef, body: string): Promise<void>;
  deleteComment(pr: PullRequestRef, commentId: number): Promise<void>;
  hasWritePermission(pr: PullRequestRef, actor: string): Promise<boolean>;
}
