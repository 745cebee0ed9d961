import { CompilerError, type SourceLocation } from "#errors";
import { Severity } from "#result";

export enum ErrorCode {
  INVALID_POINTER = "IR001",
  STRUCTURAL_PRECONDITION = "IR002",
  INVARIANT_VIOLATION = "IR003",
}

export const ErrorMessages = {
  [ErrorCode.INVALID_POINTER]: "Dereferenced a deallocated IR node",
  [ErrorCode.STRUCTURAL_PRECONDITION]: "Structural precondition violated",
  [ErrorCode.INVARIANT_VIOLATION]: "IR invariant violated",
};

/**
 * IR errors signal malformed IR produced by a faulty compiler pass,
 * never bad user input. Storage primitives raise them too, so the type
 * lives below the IR entities.
 */
export class Error extends CompilerError {
  constructor(
    code: ErrorCode,
    message?: string,
    location?: SourceLocation,
    severity: Severity = Severity.Error,
  ) {
    const baseMessage = ErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code, location, severity);
  }
}
