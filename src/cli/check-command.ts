import { getOctokit } from "@actions/github";
import { loadConfig } from "../config/config-loader.js";
import { findRepoPolicy } from "../config/repo-filter.js";
import type { RepoPolicy } from "../config/types.js";
import { evaluatePullRequest } from "../gate/evaluator.js";
import type { EvaluationOutcome } from "../gate/types.js";
import type { GateLogger } from "../logging/logger.js";
import { GitHubPlatform } from "../platform/github-platform.js";
import type { Platform } from "../platform/types.js";
import { createHttpChecker } from "../signature/signature-checker.js";
import type { SignatureChecker } from "../signature/types.js";
import { resolveConfigPath } from "./runtime-paths.js";

export interface CheckOptions {
  readonly org: string;
  readonly repo: string;
  readonly number: number;
  readonly configPath?: string;
  readonly token?: string;
  readonly logger: GateLogger;
  readonly platform?: Platform;
  readonly createChecker?: (policy: RepoPolicy) => SignatureChecker;
}

export interface CheckResult {
  readonly outcome: EvaluationOutcome;
  readonly output: string;
}

/**
 * Evaluate one pull request on demand, as `/check-cla` would.
 */
export async function runCheckCommand(
  options: CheckOptions,
): Promise<CheckResult> {
  if (!Number.isInteger(options.number) || options.number <= 0) {
    throw new Error(`Invalid pull request number: ${options.number}`);
  }
  const configPath = await resolveConfigPath(options.configPath);
  const config = await loadConfig(configPath);
  const policy = findRepoPolicy(config, options.org, options.repo);
  if (!policy) {
    throw new Error(`No config for this repo: ${options.org}/${options.repo}`);
  }

  const platform = options.platform ?? createGitHubPlatform(options.token);
  const outcome = await evaluatePullRequest(
    { org: options.org, repo: options.repo, number: options.number },
    policy,
    {
      config,
      platform,
      createChecker: options.createChecker ?? createHttpChecker,
      logger: options.logger,
    },
  );

  const target = `${options.org}/${options.repo}#${options.number}`;
  const names =
    outcome.names.length > 0 ? ` (${outcome.names.join(", ")})` : "";
  return { outcome, output: `${target}: ${outcome.status}${names}` };
}

export function createGitHubPlatform(token?: string): GitHubPlatform {
  const resolved = token ?? process.env.GITHUB_TOKEN;
  if (!resolved) {
    throw new Error("Missing GITHUB_TOKEN");
  }
  return new GitHubPlatform(getOctokit(resolved));
}
