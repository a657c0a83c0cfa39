/**
 * Normalized issue and comment shapes returned by the Issues proxy.
 *
 * Field names follow GitHub's REST API so clients can switch between the proxy and
 * the upstream API without remapping.
 */

export type IssueState = "open" | "closed";

export type IssueRecord = {
  number: number;
  html_url: string;
  state: string;
  title: string;
  body: string | null;
  /** Label names; label objects collapse to their `name` */
  labels: string[];
  created_at: string;
  updated_at: string;
};

export type CommentRecord = {
  id: number;
  html_url: string;
  body: string;
  /** Author login */
  user: string;
  created_at: string;
  updated_at: string;
};

export type CreateIssueInput = {
  title: string;
  body?: string;
  labels?: string[];
};

export type ListIssuesInput = {
  state: IssueState | "all";
  /** Comma-separated label names, passed through to GitHub */
  labels?: string;
  page: number;
  perPage: number;
};

export type UpdateIssueInput = {
  title?: string;
  body?: string;
  state?: IssueState;
};

export type IssuePage = {
  issues: IssueRecord[];
  /** Upstream pagination Link header, when GitHub sent one */
  link?: string;
};

export interface IssueClient {
  createIssue(input: CreateIssueInput): Promise<IssueRecord>;
  listIssues(input: ListIssuesInput): Promise<IssuePage>;
  getIssue(issueNumber: number): Promise<IssueRecord>;
  updateIssue(issueNumber: number, input: UpdateIssueInput): Promise<IssueRecord>;
  createComment(issueNumber: number, body: string): Promise<CommentRecord>;
}
