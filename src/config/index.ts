export { loadConfig, parseConfigText } from "./config-loader.js";
export {
  DEFAULT_FAQ_URL_PLACEHOLDER,
  DEFAULT_SIGN_URL_PLACEHOLDER,
  validateConfig,
} from "./config-validator.js";
export { canApply, findRepoPolicy } from "./repo-filter.js";
export type {
  CommentTemplates,
  GateConfig,
  LitePrCommitter,
  RepoFilter,
  RepoPolicy,
} from "./types.js";
