import { z } from "zod";

import { ClioValidationError } from "./errors";
import type { TimeEntryInput } from "../connectors/types";

const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

const isoTimestamp = z
  .string()
  .refine((value) => ISO_DATE_PREFIX.test(value) && !Number.isNaN(Date.parse(value)), {
    message: "must be an ISO-8601 timestamp",
  });

export const timeEntryInputSchema = z
  .object({
    matterId: z.string().refine((value) => value.trim().length > 0, { message: "is required" }),
    startTime: isoTimestamp,
    endTime: isoTimestamp,
    durationSeconds: z
      .number({ invalid_type_error: "must be a number" })
      .finite({ message: "must be finite" })
      .nonnegative({ message: "must be non-negative" }),
    description: z.string(),
  })
  .superRefine((value, ctx) => {
    const start = Date.parse(value.startTime);
    const end = Date.parse(value.endTime);
    if (!Number.isNaN(start) && !Number.isNaN(end) && end < start) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["endTime"],
        message: "must not precede startTime",
      });
    }
  });

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join(".");
    return field ? `${field}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate caller input for a time entry.
 * @throws ClioValidationError listing every issue found
 */
export function parseTimeEntryInput(input: TimeEntryInput): TimeEntryInput {
  const result = timeEntryInputSchema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ClioValidationError(`Invalid time entry: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

const clioId = z.union([z.number().int(), z.string().min(1)]);

export const clioMatterSchema = z.object({
  id: clioId,
  display_number: z.string().nullish(),
  description: z.string().nullish(),
  status: z.string().nullish(),
});

export type ClioMatterRow = z.infer<typeof clioMatterSchema>;

export const matterListResponseSchema = z.object({
  data: z.array(clioMatterSchema),
});

export const activityResponseSchema = z.object({
  data: z.object({
    id: clioId,
  }),
});

export const clioErrorBodySchema = z.object({
  error: z.object({
    type: z.string().optional(),
    message: z.string(),
  }),
});
