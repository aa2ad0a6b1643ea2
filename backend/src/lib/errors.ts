export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ReferenceDataError extends Error {
  constructor(
    message: string,
    readonly file?: string
  ) {
    super(message);
    this.name = "ReferenceDataError";
  }
}

/** A collaborator (store, reference data, scorer) failed or could not be reached. */
export class DependencyError extends Error {
  constructor(
    readonly dependency: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DependencyError";
  }
}

export class DependencyTimeoutError extends DependencyError {
  constructor(dependency: string, timeoutMs: number) {
    super(dependency, `${dependency} did not respond within ${timeoutMs}ms`);
    this.name = "DependencyTimeoutError";
  }
}

export class PipelineCancelledError extends Error {
  constructor(stage: string) {
    super(`Pipeline cancelled during ${stage}`);
    this.name = "PipelineCancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
