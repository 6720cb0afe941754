export {
  commentEventFromPayload,
  pullRequestEventFromPayload,
} from "./github-events.js";
export { GitHubPlatform } from "./github-platform.js";
export type { GitHubClient } from "./github-platform.js";
export type { Platform, PrComment, PullRequestRef } from "./types.js";
