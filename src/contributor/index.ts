export { extractContributors } from "./contributor-extractor.js";
export type { Commit, ExtractionOptions, Identity } from "./types.js";
