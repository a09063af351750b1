/**
 * Raised for deployment or programming defects: a vector of the wrong width,
 * an invalid weight, an embedding endpoint configured for a dimension the
 * schema does not store. Never used for data conditions.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export class SearchTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} did not complete within ${timeoutMs}ms`);
    this.name = "SearchTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Rejects with `SearchTimeoutError` when `promise` outlives `timeoutMs`. */
export const withDeadline = async <T>(
  operation: string,
  promise: Promise<T>,
  timeoutMs: number,
): Promise<T> => {
  let timeoutId: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new SearchTimeoutError(operation, timeoutMs)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
};
