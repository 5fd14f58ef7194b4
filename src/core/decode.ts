import type { ZodError, ZodTypeAny, output } from "zod";
import { DecodeError } from "./errors";

const describeZodError = (error: ZodError): string => {
  const issue = error.issues[0];
  if (!issue) return "does not match the expected shape";
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
};

export const parseJsonBody = (text: string, subject: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new DecodeError({ subject, issue: "body is not valid JSON", cause: err });
  }
};

/**
 * Validates an already-parsed value against a schema, mapping zod failures
 * to `DecodeError`.
 */
export const decodeWith = <S extends ZodTypeAny>(schema: S, value: unknown, subject: string): output<S> => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DecodeError({ subject, issue: describeZodError(result.error), cause: result.error });
  }
  return result.data;
};
