import { IrError, ErrorCode, ErrorMessages } from "#infra";
import { Result } from "#result";

export { IrError as Error, ErrorCode, ErrorMessages };

/**
 * Run a mutation, turning a thrown IR error into a failed result.
 * Anything that is not an IR error is re-thrown.
 */
export function capture<T>(operation: () => T): Result<T, IrError> {
  try {
    return Result.ok(operation());
  } catch (error) {
    if (error instanceof IrError) {
      return Result.err(error);
    }
    throw error;
  }
}
