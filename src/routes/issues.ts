import { Hono, type Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import type { ZodError } from "zod";
import {
  createCommentSchema,
  createIssueSchema,
  issueNumberSchema,
  listIssuesQuerySchema,
  updateIssueSchema,
} from "../issues/schemas.ts";
import type { IssueClient } from "../issues/types.ts";

interface IssueRouteDeps {
  issues: IssueClient;
  logger: Logger;
}

function hasStatusCode(error: unknown): error is { status: number; message?: unknown } {
  return (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  );
}

function isErrorStatus(status: number): status is ContentfulStatusCode {
  return Number.isInteger(status) && status >= 400 && status <= 599;
}

function validationError(c: Context, error: ZodError) {
  return c.json(
    {
      error: "Invalid request",
      details: error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    },
    400,
  );
}

/** Parse a JSON body; a malformed body reads as undefined and fails schema validation. */
async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}

export function createIssueRoutes(deps: IssueRouteDeps): Hono {
  const { issues, logger } = deps;
  const app = new Hono();

  // GitHub API failures keep their upstream status; anything else goes to app.onError
  app.onError((err, c) => {
    if (hasStatusCode(err) && isErrorStatus(err.status)) {
      logger.warn(
        { status: err.status, path: c.req.path, method: c.req.method },
        "GitHub API request failed",
      );
      const message = typeof err.message === "string" ? err.message : "GitHub API error";
      return c.json({ error: message }, err.status);
    }
    throw err;
  });

  app.post("/issues", async (c) => {
    const parsed = createIssueSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }

    const issue = await issues.createIssue(parsed.data);
    c.header("Location", `/issues/${issue.number}`);
    return c.json(issue, 201);
  });

  app.get("/issues", async (c) => {
    const parsed = listIssuesQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }

    const { state, labels, page, per_page } = parsed.data;
    const result = await issues.listIssues({ state, labels, page, perPage: per_page });
    if (result.link) {
      c.header("Link", result.link);
    }
    return c.json(result.issues);
  });

  app.get("/issues/:number", async (c) => {
    const issueNumber = issueNumberSchema.safeParse(c.req.param("number"));
    if (!issueNumber.success) {
      return validationError(c, issueNumber.error);
    }

    return c.json(await issues.getIssue(issueNumber.data));
  });

  app.patch("/issues/:number", async (c) => {
    const issueNumber = issueNumberSchema.safeParse(c.req.param("number"));
    if (!issueNumber.success) {
      return validationError(c, issueNumber.error);
    }
    const parsed = updateIssueSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }

    return c.json(await issues.updateIssue(issueNumber.data, parsed.data));
  });

  app.post("/issues/:number/comments", async (c) => {
    const issueNumber = issueNumberSchema.safeParse(c.req.param("number"));
    if (!issueNumber.success) {
      return validationError(c, issueNumber.error);
    }
    const parsed = createCommentSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }

    const comment = await issues.createComment(issueNumber.data, parsed.data.body);
    return c.json(comment, 201);
  });

  return app;
}
