import { z } from "zod";

import { CONTENT_TYPES, PRIORITIES } from "../tabs/types.js";

/** Project buckets offered to the model. */
export const PROJECT_CATEGORIES = [
  "argumentation_on_the_web",
  "democratic_economic_planning",
  "other_research",
  "personal",
  "work",
] as const;

export const MAX_TAGS = 10;
export const MAX_PROJECTS = 5;

const trimmedLabels = z
  .array(z.string())
  .default([])
  .transform((values) => values.map((value) => value.trim()).filter((value) => value.length > 0));

/**
 * JSON object the model must produce. List lengths are not bounded here: the
 * engine truncates over-long lists instead of failing the attempt.
 */
export const modelEnrichmentSchema = z.object({
  summary: z.string().trim().min(10).max(500),
  content_type: z.enum(CONTENT_TYPES),
  tags: trimmedLabels,
  projects: trimmedLabels,
  est_read_min: z.number().int().min(1).max(600).nullish(),
  priority: z.enum(PRIORITIES).nullish(),
});

export type ModelEnrichment = z.infer<typeof modelEnrichmentSchema>;

/** Renders zod issues as `path: message` pairs on one line. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
