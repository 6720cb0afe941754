import type { getOctokit } from "@actions/github";
import type { Commit } from "../contributor/types.js";
import type { Platform, PrComment, PullRequestRef } from "./types.js";

export type GitHubClient = ReturnType<typeof getOctokit>;

const WRITE_PERMISSIONS = new Set(["admin", "maintain", "write"]);

export class GitHubPlatform implements Platform {
  constructor(private readonly octokit: GitHubClient) {}

  /**
   * Rejects when GitHub returns fewer commits than the pull request reports.
   * The commits endpoint stops at 250 entries.
   */
  async listCommits(pr: PullRequestRef): Promise<Commit[]> {
    const { data: pull } = await this.octokit.rest.pulls.get({
      owner: pr.org,
      repo: pr.repo,
      pull_number: pr.number,
    });
    const commits = await this.octokit.paginate(
      this.octokit.rest.pulls.listCommits,
      { owner: pr.org, repo: pr.repo, pull_number: pr.number, per_page: 100 },
    );
    if (commits.length < pull.commits) {
      throw new Error(
        `Fetched ${commits.length} of ${pull.commits} commits on ${pr.org}/${pr.repo}#${pr.number}`,
      );
    }
    return commits.map((entry) => ({
      authorName: entry.commit.author?.name ?? "",
      authorEmail: entry.commit.author?.email ?? "",
      committerName: entry.commit.committer?.name ?? "",
      committerEmail: entry.commit.committer?.email ?? "",
    }));
  }

  async listLabels(pr: PullRequestRef): Promise<string[]> {
    const labels = await this.octokit.paginate(
      this.octokit.rest.issues.listLabelsOnIssue,
      { owner: pr.org, repo: pr.repo, issue_number: pr.number, per_page: 100 },
    );
    return labels.map((label) => label.name);
  }

  async addLabels(
    pr: PullRequestRef,
    labels: readonly string[],
  ): Promise<void> {
    await this.octokit.rest.issues.addLabels({
      owner: pr.org,
      repo: pr.repo,
      issue_number: pr.number,
      labels: [...labels],
    });
  }

  async removeLabel(pr: PullRequestRef, label: string): Promise<void> {
    try {
      await this.octokit.rest.issues.removeLabel({
        owner: pr.org,
        repo: pr.repo,
        issue_number: pr.number,
        name: label,
      });
    } catch (error) {
      // Already absent.
      if (statusOf(error) === 404) {
        return;
      }
      throw error;
    }
  }

  async listComments(pr: PullRequestRef): Promise<PrComment[]> {
    const comments = await this.octokit.paginate(
      this.octokit.rest.issues.listComments,
      { owner: pr.org, repo: pr.repo, issue_number: pr.number, per_page: 100 },
    );
    return comments.map((comment) => ({
      id: comment.id,
      body: comment.body ?? "",
    }));
  }

  async createComment(pr: PullRequestRef, body: string): Promise<void> {
    await this.octokit.rest.issues.createComment({
      owner: pr.org,
      repo: pr.repo,
      issue_number: pr.number,
      body,
    });
  }

  async deleteComment(pr: PullRequestRef, commentId: number): Promise<void> {
    await this.octokit.rest.issues.deleteComment({
      owner: pr.org,
      repo: pr.repo,
      comment_id: commentId,
    });
  }

  async hasWritePermission(
    pr: PullRequestRef,
    actor: string,
  ): Promise<boolean> {
    const response =
      await this.octokit.rest.repos.getCollaboratorPermissionLevel({
        owner: pr.org,
        repo: pr.repo,
        username: actor,
      });
    const role = response.data.role_name ?? response.data.permission;
    return (
      WRITE_PERMISSIONS.has(response.data.permission) ||
      WRITE_PERMISSIONS.has(role)
    );
  }
}

function statusOf(error: unknown): number | undefined {
  if (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    return error.status;
  }
  return undefined;
}
