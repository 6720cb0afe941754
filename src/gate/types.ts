import type { GateConfig, RepoPolicy } from "../config/types.js";
import type { GateLogger } from "../logging/logger.js";
import type { Platform } from "../platform/types.js";
import type { SignatureChecker } from "../signature/types.js";

export const enum PullRequestState {
  Opened = "opened",
  Merged = "merged",
}

export const enum PullRequestAction {
  Open = "open",
  Update = "update",
}

export interface PullRequestEvent {
  readonly org: string;
  readonly repo: string;
  readonly number: number;
  readonly state: string;
  readonly action: string;
}

export interface CommentEvent {
  readonly org: string;
  readonly repo: string;
  readonly number: number;
  readonly comment: string;
  readonly commenter: string;
}

export interface GateDependencies {
  readonly config: GateConfig;
  readonly platform: Platform;
  readonly createChecker: (policy: RepoPolicy) => SignatureChecker;
  readonly logger: GateLogger;
}

export type EvaluationStatus =
  | "ignored"
  | "fetch-failed"
  | "no-commits"
  | "pending"
  | "pass"
  | "fail"
  | "cancelled"
  | "denied";

export interface EvaluationOutcome {
  readonly status: EvaluationStatus;
  readonly names: readonly string[];
}
