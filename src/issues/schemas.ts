import { z } from "zod";

export const createIssueSchema = z.object({
  title: z.string().min(1, "title is required"),
  body: z.string().optional(),
  labels: z.array(z.string()).default([]),
});

export const listIssuesQuerySchema = z.object({
  state: z.enum(["open", "closed", "all"]).default("open"),
  labels: z.string().optional(),
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(100).default(30),
});

export const updateIssueSchema = z.object({
  title: z.string().optional(),
  body: z.string().optional(),
  state: z.enum(["open", "closed"]).optional(),
});

export const createCommentSchema = z.object({
  body: z.string().min(1, "body is required"),
});

export const issueNumberSchema = z.coerce.number().int().positive();
