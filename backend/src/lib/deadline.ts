import { DependencyError, DependencyTimeoutError, PipelineCancelledError, errorMessage } from "./errors";

export function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) throw new PipelineCancelledError(stage);
}

/**
 * Runs one call to an external collaborator under a deadline. The work gets
 * its own AbortSignal, aborted on timeout or when the caller cancels.
 * Timeouts and failures surface as DependencyError; caller cancellation
 * surfaces as PipelineCancelledError.
 */
export function withDeadline<T>(
  dependency: string,
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T> | T,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) return Promise.reject(new PipelineCancelledError(dependency));
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const finish = (action: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener("abort", onCancel);
      action();
    };

    const onCancel = () => {
      controller.abort();
      finish(() => reject(new PipelineCancelledError(dependency)));
    };
    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(new DependencyTimeoutError(dependency, timeoutMs)));
    }, timeoutMs);
    parent?.addEventListener("abort", onCancel, { once: true });

    Promise.resolve()
      .then(() => work(controller.signal))
      .then(
        (value) => finish(() => resolve(value)),
        (error: unknown) =>
          finish(() =>
            reject(
              error instanceof DependencyError || error instanceof PipelineCancelledError
                ? error
                : new DependencyError(dependency, `${dependency} failed: ${errorMessage(error)}`, { cause: error })
            )
          )
      );
  });
}
