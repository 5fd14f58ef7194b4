import type { Outcome } from "../../core/outcome/Outcome";
import type { JobResolver, PollResult, ResolveOptions } from "./JobResolver";

export type Settled<T> =
  | { kind: "resolved"; resource: T }
  | { kind: "job"; result: PollResult };

/**
 * Follows a pending outcome through the resolver; a resolved one is passed
 * through untouched.
 */
export const settleOutcome = async <T>(
  outcome: Outcome<T>,
  resolver: Pick<JobResolver, "resolve">,
  options: ResolveOptions = {}
): Promise<Settled<T>> => {
  if (outcome.kind === "resolved") {
    return { kind: "resolved", resource: outcome.resource };
  }
  return { kind: "job", result: await resolver.resolve(outcome.job.jobId, options) };
};
