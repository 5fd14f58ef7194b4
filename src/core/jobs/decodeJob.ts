import { z } from "zod";
import { decodeWith, parseJsonBody } from "../decode";
import type { ApiError, Job } from "./Job";

export const ApiErrorSchema = z.object({
  code: z.number().int().default(0),
  title: z.string().default(""),
  detail: z.string()
});

const JobWarningSchema = z.object({
  detail: z.string()
});

const JobLinkSchema = z.object({
  href: z.string(),
  method: z.string().optional()
});

// The control plane omits empty errors/warnings, and some versions send null.
const listOf = <T extends z.ZodTypeAny>(item: T) =>
  z
    .array(item)
    .nullish()
    .transform((items) => items ?? []);

export const JobWireSchema = z.object({
  guid: z.string().min(1),
  operation: z.string(),
  state: z.string().min(1),
  errors: listOf(ApiErrorSchema),
  warnings: listOf(JobWarningSchema),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
  links: z.record(z.string(), JobLinkSchema).optional()
});

export const decodeJobPayload = (payload: unknown): Job => {
  const wire = decodeWith(JobWireSchema, payload, "job");
  const job: Job = {
    guid: wire.guid,
    operation: wire.operation,
    state: wire.state,
    errors: wire.errors,
    warnings: wire.warnings
  };
  if (wire.created_at !== undefined) job.createdAt = wire.created_at;
  if (wire.updated_at !== undefined) job.updatedAt = wire.updated_at;
  if (wire.links !== undefined) job.links = wire.links;
  return job;
};

export const decodeJob = (body: string): Job => decodeJobPayload(parseJsonBody(body, "job"));

const ErrorEnvelopeSchema = z.object({
  errors: z.array(ApiErrorSchema)
});

/**
 * Best-effort extraction of the `{ errors: [...] }` envelope the control plane
 * sends with non-2xx responses. Anything else yields an empty list.
 */
export const extractApiErrors = (body: string): ApiError[] => {
  if (body.trim() === "") return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return [];
  }
  const result = ErrorEnvelopeSchema.safeParse(parsed);
  return result.success ? result.data.errors : [];
};
