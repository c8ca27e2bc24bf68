/**
 * Base error class for all merge errors
 */
export class KMergeError extends Error {
  public readonly name: string = "KMergeError";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A source failed while producing its next item.
 * Terminal for that source only, the underlying error is kept as `cause`
 */
export class UpstreamError extends KMergeError {
  public readonly name: string = "UpstreamError";
  public readonly sourceIndex: number;

  constructor(sourceIndex: number, cause: unknown) {
    super(`Source #${sourceIndex} failed: ${describe(cause)}`, { cause });
    this.sourceIndex = sourceIndex;
  }
}

/**
 * Invalid options or comparator, thrown synchronously at construction
 */
export class ConfigurationError extends KMergeError {
  public readonly name: string = "ConfigurationError";

  constructor(message: string) {
    super(message);
  }
}

export class MergeTerminatedError extends KMergeError {
  public readonly name: string = "MergeTerminatedError";

  constructor() {
    super("Cannot add a source to a terminated merge");
  }
}

function describe(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
