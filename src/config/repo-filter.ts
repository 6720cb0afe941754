import type { GateConfig, RepoFilter, RepoPolicy } from "./types.js";

export function canApply(
  filter: RepoFilter,
  org: string,
  repo: string,
): boolean {
  const fullName = `${org}/${repo}`;
  const excluded = filter.excluded_repos;
  if (excluded.includes(fullName) || excluded.includes(org)) {
    return false;
  }
  return filter.repos.includes(fullName) || filter.repos.includes(org);
}

/**
 * Find the policy for a repository. The first applying item wins.
 */
export function findRepoPolicy(
  config: GateConfig,
  org: string,
  repo: string,
): RepoPolicy | undefined {
  return config.config_items.find((item) => canApply(item, org, repo));
}
