import type {
  CommentTemplates,
  GateConfig,
  LitePrCommitter,
  RepoPolicy,
} from "./types.js";

const REQUIRED_TEMPLATE_KEYS = [
  "user_mark_format",
  "placeholder_committer",
  "placeholder_cla_sign_guide_title",
  "placeholder_cla_sign_pass_title",
  "comment_command_trigger",
  "comment_pr_no_commits",
  "comment_all_signed",
  "comment_some_need_sign",
  "comment_update_label_failed",
] as const;

export const DEFAULT_SIGN_URL_PLACEHOLDER = "${sign_url}";
export const DEFAULT_FAQ_URL_PLACEHOLDER = "${faq_url}";

const REQUIRED_POLICY_KEYS = [
  "cla_label_yes",
  "cla_label_no",
  "check_url",
  "sign_url",
  "faq_url",
] as const;

const CONFIG_KEYS = new Set<string>([
  ...REQUIRED_TEMPLATE_KEYS,
  "placeholder_sign_url",
  "placeholder_faq_url",
  "config_items",
]);
const POLICY_KEYS = new Set<string>([
  ...REQUIRED_POLICY_KEYS,
  "repos",
  "excluded_repos",
  "check_by_committer",
  "lite_pr_committer",
]);
const LITE_COMMITTER_KEYS = new Set(["email", "name"]);

/**
 * Validate and normalize a parsed configuration document. Every problem is
 * collected before throwing so a single run reports all of them.
 */
export function validateConfig(input: unknown): GateConfig {
  const errors: string[] = [];
  const config = parseConfig(input, errors);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.join("; ")}`);
  }
  return config;
}

function parseConfig(input: unknown, errors: string[]): GateConfig {
  if (!isRecord(input)) {
    errors.push("configuration must be an object");
    return { ...emptyTemplates(), config_items: [] };
  }
  assertNoExtraKeys(input, CONFIG_KEYS, "configuration", errors);

  const templates = parseTemplates(input, errors);
  const items = input.config_items ?? [];
  let configItems: RepoPolicy[] = [];
  if (Array.isArray(items)) {
    configItems = items.map((item: unknown, index) =>
      parseRepoPolicy(item, `config_items[${index}]`, errors),
    );
  } else {
    errors.push("config_items must be an array");
  }

  return { ...templates, config_items: configItems };
}

function parseTemplates(
  input: Record<string, unknown>,
  errors: string[],
): CommentTemplates {
  const required = (key: (typeof REQUIRED_TEMPLATE_KEYS)[number]): string =>
    requireString(input[key], key, errors);
  return {
    user_mark_format: required("user_mark_format"),
    placeholder_committer: required("placeholder_committer"),
    placeholder_sign_url: optionalString(
      input.placeholder_sign_url,
      "placeholder_sign_url",
      DEFAULT_SIGN_URL_PLACEHOLDER,
      errors,
    ),
    placeholder_faq_url: optionalString(
      input.placeholder_faq_url,
      "placeholder_faq_url",
      DEFAULT_FAQ_URL_PLACEHOLDER,
      errors,
    ),
    placeholder_cla_sign_guide_title: required(
      "placeholder_cla_sign_guide_title",
    ),
    placeholder_cla_sign_pass_title: required(
      "placeholder_cla_sign_pass_title",
    ),
    comment_command_trigger: required("comment_command_trigger"),
    comment_pr_no_commits: required("comment_pr_no_commits"),
    comment_all_signed: required("comment_all_signed"),
    comment_some_need_sign: required("comment_some_need_sign"),
    comment_update_label_failed: required("comment_update_label_failed"),
  };
}

function parseRepoPolicy(
  input: unknown,
  path: string,
  errors: string[],
): RepoPolicy {
  if (!isRecord(input)) {
    errors.push(`${path} must be an object`);
    return emptyRepoPolicy();
  }
  assertNoExtraKeys(input, POLICY_KEYS, path, errors);

  const repos = parseStringArray(input.repos, `${path}.repos`, errors);
  if (Array.isArray(input.repos) && repos.length === 0) {
    errors.push(`${path}.repos must not be empty`);
  }
  const excluded =
    input.excluded_repos === undefined
      ? []
      : parseStringArray(
          input.excluded_repos,
          `${path}.excluded_repos`,
          errors,
        );

  const checkByCommitter = input.check_by_committer ?? false;
  if (typeof checkByCommitter !== "boolean") {
    errors.push(`${path}.check_by_committer must be a boolean`);
  }
  const byCommitter = checkByCommitter === true;

  let litePrCommitter: LitePrCommitter = { email: "", name: "" };
  if (input.lite_pr_committer !== undefined) {
    litePrCommitter = parseLiteCommitter(
      input.lite_pr_committer,
      `${path}.lite_pr_committer`,
      errors,
    );
  } else if (byCommitter) {
    errors.push(
      `${path}.lite_pr_committer is required when check_by_committer is true`,
    );
  }

  const required = (key: (typeof REQUIRED_POLICY_KEYS)[number]): string =>
    requireString(input[key], `${path}.${key}`, errors);

  return {
    repos,
    excluded_repos: excluded,
    cla_label_yes: required("cla_label_yes"),
    cla_label_no: required("cla_label_no"),
    check_url: requireUrl(
      required("check_url"),
      `${path}.check_url`,
      errors,
    ),
    sign_url: required("sign_url"),
    faq_url: required("faq_url"),
    check_by_committer: byCommitter,
    lite_pr_committer: litePrCommitter,
  };
}

function parseLiteCommitter(
  input: unknown,
  path: string,
  errors: string[],
): LitePrCommitter {
  if (!isRecord(input)) {
    errors.push(`${path} must be an object`);
    return { email: "", name: "" };
  }
  assertNoExtraKeys(input, LITE_COMMITTER_KEYS, path, errors);
  return {
    email: requireString(input.email, `${path}.email`, errors),
    name: requireString(input.name, `${path}.name`, errors),
  };
}

function requireUrl(value: string, path: string, errors: string[]): string {
  if (value.length > 0 && !URL.canParse(value)) {
    errors.push(`${path} must be an absolute URL`);
  }
  return value;
}

function requireString(value: unknown, path: string, errors: string[]): string {
  if (value === undefined) {
    errors.push(`missing ${path}`);
    return "";
  }
  if (typeof value !== "string" || value.length === 0) {
    errors.push(`${path} must be a non-empty string`);
    return "";
  }
  return value;
}

function optionalString(
  value: unknown,
  path: string,
  fallback: string,
  errors: string[],
): string {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "string" || value.length === 0) {
    errors.push(`${path} must be a non-empty string`);
    return fallback;
  }
  return value;
}

function parseStringArray(
  input: unknown,
  path: string,
  errors: string[],
): string[] {
  if (!Array.isArray(input)) {
    errors.push(`${path} must be an array`);
    return [];
  }
  const values: string[] = [];
  input.forEach((entry, index) => {
    if (typeof entry !== "string" || entry.length === 0) {
      errors.push(`${path}[${index}] must be a non-empty string`);
      return;
    }
    values.push(entry);
  });
  return values;
}

function assertNoExtraKeys(
  input: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  path: string,
  errors: string[],
): void {
  for (const key of Object.keys(input)) {
    if (!allowed.has(key)) {
      errors.push(`${path} contains unsupported field '${key}'`);
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function emptyTemplates(): CommentTemplates {
  return {
    user_mark_format: "",
    placeholder_committer: "",
    placeholder_sign_url: DEFAULT_SIGN_URL_PLACEHOLDER,
    placeholder_faq_url: DEFAULT_FAQ_URL_PLACEHOLDER,
    placeholder_cla_sign_guide_title: "",
    placeholder_cla_sign_pass_title: "",
    comment_command_trigger: "",
    comment_pr_no_commits: "",
    comment_all_signed: "",
    comment_some_need_sign: "",
    comment_update_label_failed: "",
  };
}

function emptyRepoPolicy(): RepoPolicy {
  return {
    repos: [],
    excluded_repos: [],
    cla_label_yes: "",
    cla_label_no: "",
    check_url: "",
    sign_url: "",
    faq_url: "",
    check_by_committer: false,
    lite_pr_committer: { email: "", name: "" },
  };
}
