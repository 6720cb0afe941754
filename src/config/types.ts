export interface LitePrCommitter {
  readonly email: string;
  readonly name: string;
}

export interface RepoFilter {
  /** Entries are either `org` or `org/repo`. */
  readonly repos: readonly string[];
  readonly excluded_repos: readonly string[];
}

export interface RepoPolicy extends RepoFilter {
  readonly cla_label_yes: string;
  readonly cla_label_no: string;
  /** Queried as `<check_url>?email=<email>`. */
  readonly check_url: string;
  readonly sign_url: string;
  readonly faq_url: string;
  /** Identify contributors by committer instead of author. */
  readonly check_by_committer: boolean;
  /** Placeholder committer of lightweight PR flows, never checked. */
  readonly lite_pr_committer: LitePrCommitter;
}

export interface CommentTemplates {
  readonly user_mark_format: string;
  readonly placeholder_committer: string;
  readonly placeholder_sign_url: string;
  readonly placeholder_faq_url: string;
  readonly placeholder_cla_sign_guide_title: string;
  readonly placeholder_cla_sign_pass_title: string;
  readonly comment_command_trigger: string;
  readonly comment_pr_no_commits: string;
  readonly comment_all_signed: string;
  readonly comment_some_need_sign: string;
  readonly comment_update_label_failed: string;
}

export interface GateConfig extends CommentTemplates {
  readonly config_items: readonly RepoPolicy[];
}
