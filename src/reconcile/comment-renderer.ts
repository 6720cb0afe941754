import type { CommentTemplates, RepoPolicy } from "../config/types.js";

export function renderUserMarks(
  names: readonly string[],
  templates: CommentTemplates,
): string {
  const { user_mark_format, placeholder_committer } = templates;
  return names
    .map((name) => substitute(user_mark_format, placeholder_committer, name))
    .join(", ");
}

export function renderAllSignedComment(
  signers: readonly string[],
  templates: CommentTemplates,
): string {
  return substitute(
    templates.comment_all_signed,
    templates.placeholder_committer,
    renderUserMarks(signers, templates),
  );
}

export function renderNeedSignComment(
  unsigned: readonly string[],
  policy: Pick<RepoPolicy, "sign_url" | "faq_url">,
  templates: CommentTemplates,
): string {
  let body = substitute(
    templates.comment_some_need_sign,
    templates.placeholder_committer,
    renderUserMarks(unsigned, templates),
  );
  body = substitute(body, templates.placeholder_sign_url, policy.sign_url);
  return substitute(body, templates.placeholder_faq_url, policy.faq_url);
}

// Function replacer keeps `$` sequences in names literal.
function substitute(template: string, token: string, value: string): string {
  return template.replaceAll(token, () => value);
}
