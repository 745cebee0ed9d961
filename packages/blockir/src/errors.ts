/**
 * Base error type shared by every compiler layer
 */

import { Severity } from "#result";

/**
 * Byte range in the source text an IR node was lowered from
 */
export interface SourceLocation {
  offset: number;
  length: number;
}

export class CompilerError extends Error {
  public readonly code: string;
  public readonly location?: SourceLocation;
  public readonly severity: Severity;

  constructor(
    message: string,
    code: string,
    location?: SourceLocation,
    severity: Severity = Severity.Error,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.location = location;
    this.severity = severity;
  }
}
