import { Octokit, type RestEndpointMethodTypes } from "@octokit/rest";
import type { Logger } from "pino";
import type {
  CommentRecord,
  CreateIssueInput,
  IssueClient,
  IssuePage,
  IssueRecord,
  ListIssuesInput,
  UpdateIssueInput,
} from "./types.ts";

type GitHubIssue = RestEndpointMethodTypes["issues"]["get"]["response"]["data"];
type GitHubComment = RestEndpointMethodTypes["issues"]["createComment"]["response"]["data"];

export function toIssueRecord(issue: GitHubIssue): IssueRecord {
  return {
    number: issue.number,
    html_url: issue.html_url,
    state: issue.state,
    title: issue.title,
    body: issue.body ?? null,
    labels: (issue.labels ?? []).map((l) => (typeof l === "string" ? l : l.name ?? "")),
    created_at: issue.created_at,
    updated_at: issue.updated_at,
  };
}

export function toCommentRecord(comment: GitHubComment): CommentRecord {
  return {
    id: comment.id,
    html_url: comment.html_url,
    body: comment.body ?? "",
    user: comment.user?.login ?? "ghost",
    created_at: comment.created_at,
    updated_at: comment.updated_at,
  };
}

/** Octokit authenticated with a token, with its request log routed into pino. */
export function createGitHubOctokit(opts: {
  token: string;
  logger: Logger;
  fetch?: typeof globalThis.fetch;
}): Octokit {
  const { logger } = opts;
  return new Octokit({
    auth: opts.token,
    userAgent: "github-issue-service",
    request: opts.fetch ? { fetch: opts.fetch } : undefined,
    log: {
      debug: (message: string) => logger.debug(message),
      info: (message: string) => logger.debug(message),
      warn: (message: string) => logger.warn(message),
      // Failed requests are reported with their status by the route layer
      error: (message: string) => logger.debug(message),
    },
  });
}

/**
 * Issues API proxy scoped to a single repository.
 *
 * Upstream errors are not caught here: Octokit's RequestError carries the GitHub
 * status, and the route layer maps it onto the response.
 */
export function createIssueClient(opts: {
  octokit: Octokit;
  owner: string;
  repo: string;
  logger: Logger;
}): IssueClient {
  const { octokit, owner, repo, logger } = opts;

  return {
    async createIssue(input: CreateIssueInput): Promise<IssueRecord> {
      const { data } = await octokit.rest.issues.create({
        owner,
        repo,
        title: input.title,
        body: input.body,
        labels: input.labels,
      });
      logger.info({ owner, repo, issueNumber: data.number }, "Issue created");
      return toIssueRecord(data);
    },

    async listIssues(input: ListIssuesInput): Promise<IssuePage> {
      const response = await octokit.rest.issues.listForRepo({
        owner,
        repo,
        state: input.state,
        labels: input.labels,
        page: input.page,
        per_page: input.perPage,
      });
      return {
        issues: response.data.map(toIssueRecord),
        link: response.headers.link,
      };
    },

    async getIssue(issueNumber: number): Promise<IssueRecord> {
      const { data } = await octokit.rest.issues.get({
        owner,
        repo,
        issue_number: issueNumber,
      });
      return toIssueRecord(data);
    },

    async updateIssue(issueNumber: number, input: UpdateIssueInput): Promise<IssueRecord> {
      const { data } = await octokit.rest.issues.update({
        owner,
        repo,
        issue_number: issueNumber,
        title: input.title,
        body: input.body,
        state: input.state,
      });
      logger.info({ owner, repo, issueNumber, fields: Object.keys(input) }, "Issue updated");
      return toIssueRecord(data);
    },

    async createComment(issueNumber: number, body: string): Promise<CommentRecord> {
      const { data } = await octokit.rest.issues.createComment({
        owner,
        repo,
        issue_number: issueNumber,
        body,
      });
      logger.info({ owner, repo, issueNumber, commentId: data.id }, "Issue comment created");
      return toCommentRecord(data);
    },
  };
}
