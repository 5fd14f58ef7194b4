/**
 * Asynchronous operation handle as reported by the control plane.
 * Read-only from the client's side: it is only ever observed by re-fetching.
 */

export const JobStates = {
  processing: "PROCESSING",
  complete: "COMPLETE",
  failed: "FAILED"
} as const;

export type KnownJobState = (typeof JobStates)[keyof typeof JobStates];

// The wire enum may grow; unrecognised values are kept verbatim and treated as non-terminal.
export type JobState = KnownJobState | (string & {});

export type ApiError = {
  code: number;
  title: string;
  detail: string;
};

export type JobWarning = {
  detail: string;
};

export type JobLink = {
  href: string;
  method?: string;
};

export type Job = {
  guid: string;
  operation: string;
  state: JobState;
  errors: ApiError[];
  warnings: JobWarning[];
  createdAt?: string;
  updatedAt?: string;
  links?: Record<string, JobLink>;
};

export const isTerminalJobState = (state: JobState): boolean =>
  state === JobStates.complete || state === JobStates.failed;
