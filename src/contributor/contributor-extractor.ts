import type { Commit, ExtractionOptions, Identity } from "./types.js";

/**
 * Collapse a commit list into the unique contributing identities.
 *
 * Identities are keyed by the exact email string. The first name seen for an
 * email is kept and the result follows first-occurrence order.
 */
export function extractContributors(
  commits: readonly Commit[],
  options: ExtractionOptions,
): Identity[] {
  const byEmail = new Map<string, Identity>();
  for (const commit of commits) {
    const identity = selectIdentity(commit, options.checkByCommitter);
    if (!byEmail.has(identity.email)) {
      byEmail.set(identity.email, identity);
    }
  }
  return Array.from(byEmail.values());
}

function selectIdentity(commit: Commit, checkByCommitter: boolean): Identity {
  if (checkByCommitter) {
    return { name: commit.committerName, email: commit.committerEmail };
  }
  return { name: commit.authorName, email: commit.authorEmail };
}
