/**
 * Result type for operations that may fail with diagnostics
 */

export enum Severity {
  Error = "error",
  Warning = "warning",
}

/**
 * Diagnostics grouped by severity
 */
export type MessagesBySeverity<E> = {
  [S in Severity]?: E[];
};

export type Result<T, E> =
  | { success: true; value: T; messages: MessagesBySeverity<E> }
  | { success: false; messages: MessagesBySeverity<E> };

export namespace Result {
  export function ok<T, E = never>(value: T): Result<T, E> {
    return { success: true, value, messages: {} };
  }

  /**
   * Successful result that still carries warnings (or other messages)
   */
  export function okWith<T, E>(
    value: T,
    messages: MessagesBySeverity<E>,
  ): Result<T, E> {
    return { success: true, value, messages };
  }

  export function err<T, E>(errors: E | E[]): Result<T, E> {
    return {
      success: false,
      messages: {
        [Severity.Error]: Array.isArray(errors) ? errors : [errors],
      },
    };
  }

  export function map<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => U,
  ): Result<U, E> {
    if (!result.success) {
      return result;
    }
    return {
      success: true,
      value: fn(result.value),
      messages: result.messages,
    };
  }

  /**
   * Chain a fallible step; messages from both steps are kept
   */
  export function andThen<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => Result<U, E>,
  ): Result<U, E> {
    if (!result.success) {
      return result;
    }
    const next = fn(result.value);
    return { ...next, messages: merge(result.messages, next.messages) };
  }

  export function hasErrors<T, E>(result: Result<T, E>): boolean {
    return (result.messages[Severity.Error]?.length ?? 0) > 0;
  }

  export function firstError<T, E>(result: Result<T, E>): E | undefined {
    return result.messages[Severity.Error]?.[0];
  }

  /**
   * Extract the value, throwing the first error on failure
   */
  export function unwrap<T, E>(result: Result<T, E>): T {
    if (result.success) {
      return result.value;
    }
    const error = firstError(result);
    if (error instanceof globalThis.Error) {
      throw error;
    }
    throw new globalThis.Error(String(error ?? "unwrap of failed result"));
  }

  function merge<E>(
    a: MessagesBySeverity<E>,
    b: MessagesBySeverity<E>,
  ): MessagesBySeverity<E> {
    const merged: MessagesBySeverity<E> = {};
    for (const severity of Object.values(Severity)) {
      const combined = [...(a[severity] ?? []), ...(b[severity] ?? [])];
      if (combined.length > 0) {
        merged[severity] = combined;
      }
    }
    return merged;
  }
}
