import path from "node:path";
import { simpleGit } from "simple-git";
import { loadConfig } from "../config/config-loader.js";
import { findRepoPolicy } from "../config/repo-filter.js";
import type { RepoPolicy } from "../config/types.js";
import { extractContributors } from "../contributor/contributor-extractor.js";
import type { Commit, Identity } from "../contributor/types.js";
import { silentLogger, type GateLogger } from "../logging/logger.js";
import { aggregateSignStates } from "../signature/aggregator.js";
import { createHttpChecker } from "../signature/signature-checker.js";
import type { Aggregation, SignatureChecker } from "../signature/types.js";
import { resolveConfigPath } from "./runtime-paths.js";

export interface PreflightOptions {
  readonly target: string;
  readonly org: string;
  readonly repo: string;
  readonly base: string;
  readonly head?: string;
  readonly configPath?: string;
  readonly format?: "text" | "json";
  readonly logger?: GateLogger;
  readonly createChecker?: (policy: RepoPolicy) => SignatureChecker;
}

export interface PreflightResult {
  readonly commits: number;
  readonly identities: readonly Identity[];
  /** Undefined when the range holds no commits. */
  readonly aggregation?: Aggregation;
  readonly output: string;
}

const LOG_FORMAT = {
  authorName: "%an",
  authorEmail: "%ae",
  committerName: "%cn",
  committerEmail: "%ce",
};

/**
 * Check the contributors of a local commit range before a pull request is
 * opened. Labels and comments are never touched.
 */
export async function runPreflightCommand(
  options: PreflightOptions,
): Promise<PreflightResult> {
  const configPath = await resolveConfigPath(options.configPath);
  const config = await loadConfig(configPath);
  const policy = findRepoPolicy(config, options.org, options.repo);
  if (!policy) {
    throw new Error(`No config for this repo: ${options.org}/${options.repo}`);
  }

  const commits = await readCommitRange(
    path.resolve(options.target),
    options.base,
    options.head ?? "HEAD",
  );
  const identities = extractContributors(commits, {
    checkByCommitter: policy.check_by_committer,
  });
  const aggregation =
    identities.length === 0
      ? undefined
      : await aggregateSignStates(
          identities,
          policy,
          (options.createChecker ?? createHttpChecker)(policy),
          { logger: options.logger ?? silentLogger },
        );

  const result = { commits: commits.length, identities, aggregation };
  const output =
    options.format === "json"
      ? JSON.stringify(toJson(result), null, 2)
      : renderText(`${options.org}/${options.repo}`, result);
  return { ...result, output };
}

export async function readCommitRange(
  repoPath: string,
  base: string,
  head: string,
): Promise<Commit[]> {
  const git = simpleGit({ baseDir: repoPath });
  const log = await git.log({ from: base, to: head, format: LOG_FORMAT });
  // git lists newest first; platforms list pull request commits oldest first.
  return [...log.all].reverse().map((entry) => ({
    authorName: entry.authorName,
    authorEmail: entry.authorEmail,
    committerName: entry.committerName,
    committerEmail: entry.committerEmail,
  }));
}

function renderText(
  repository: string,
  result: Omit<PreflightResult, "output">,
): string {
  const counts = `${result.commits} commit(s), ${result.identities.length} contributor(s)`;
  const lines = [`CLA preflight for ${repository}: ${counts}`];
  const aggregation = result.aggregation;
  if (!aggregation) {
    lines.push("Verdict: no commits");
    return lines.join("\n");
  }
  const sections: Array<[string, readonly Identity[]]> = [
    ["signed", aggregation.signed],
    ["unsigned", aggregation.unsigned],
    ["unknown", aggregation.unknown],
  ];
  for (const [state, identities] of sections) {
    for (const identity of identities) {
      lines.push(`${state.padEnd(9)}${identity.name} <${identity.email}>`);
    }
  }
  const verdict = aggregation.verdict;
  lines.push(`Verdict: ${verdict.kind} (${verdict.names.join(", ")})`);
  return lines.join("\n");
}

function toJson(result: Omit<PreflightResult, "output">): unknown {
  const aggregation = result.aggregation;
  return {
    commits: result.commits,
    verdict: aggregation?.verdict.kind ?? "no-commits",
    names: aggregation?.verdict.names ?? [],
    signed: aggregation?.signed ?? [],
    unsigned: aggregation?.unsigned ?? [],
    unknown: aggregation?.unknown ?? [],
  };
}
