export type JobHandle = {
  jobId: string;
};

/**
 * Result of a mutating call: either the final resource, or a job that still
 * has to be resolved. There is no third shape.
 */
export type Outcome<T> =
  | {
      kind: "resolved";
      resource: T;
    }
  | {
      kind: "pending";
      job: JobHandle;
    };

export const resolved = <T>(resource: T): Outcome<T> => ({ kind: "resolved", resource });

export const pending = <T = never>(jobId: string): Outcome<T> => ({ kind: "pending", job: { jobId } });

export type OutcomeHandlers<T, R> = {
  resolved: (resource: T) => R;
  pending: (job: JobHandle) => R;
};

export const matchOutcome = <T, R>(outcome: Outcome<T>, handlers: OutcomeHandlers<T, R>): R => {
  switch (outcome.kind) {
    case "resolved":
      return handlers.resolved(outcome.resource);
    case "pending":
      return handlers.pending(outcome.job);
  }
};
