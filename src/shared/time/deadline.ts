export class DeadlineExceededError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`deadline of ${timeoutMs}ms exceeded`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export type Deadline = {
  signal: AbortSignal;
  dispose: () => void;
};

/**
 * An abort signal that fires after `timeoutMs` or when `parent` aborts,
 * whichever comes first, carrying that source's reason.
 * `dispose` must be called once the guarded work is over.
 */
export const createDeadline = (timeoutMs: number, parent?: AbortSignal): Deadline => {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer = setTimeout(() => controller.abort(new DeadlineExceededError(timeoutMs)), timeoutMs);

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }
  };
};
