export type EngagementErrorCode =
  | "NOT_FOUND"
  | "FULL"
  | "DUPLICATE_REGISTRATION"
  | "INVALID_SEGMENT"
  | "INVALID_RANGE"
  | "ALREADY_COMPLETED"
  | "INVALID_INPUT"
  | "INACTIVE_CUSTOMER"
  | "FEEDBACK_ALREADY_SUBMITTED"
  | "INVALID_TRANSITION";

const statusByCode: Record<EngagementErrorCode, number> = {
  NOT_FOUND: 404,
  FULL: 409,
  DUPLICATE_REGISTRATION: 409,
  INVALID_SEGMENT: 422,
  INVALID_RANGE: 400,
  ALREADY_COMPLETED: 409,
  INVALID_INPUT: 400,
  INACTIVE_CUSTOMER: 409,
  FEEDBACK_ALREADY_SUBMITTED: 409,
  INVALID_TRANSITION: 409,
};

/**
 * Recoverable failure of a single engagement operation. The HTTP layer maps
 * `code` to a status; nothing else about the service state is affected.
 */
export class EngagementError extends Error {
  readonly status: number;

  constructor(
    readonly code: EngagementErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "EngagementError";
    this.status = statusByCode[code];
  }
}

export function notFound(entity: string, id: string): EngagementError {
  return new EngagementError("NOT_FOUND", `${entity} ${id} not found`, { entity, id });
}

export function isEngagementError(error: unknown, code?: EngagementErrorCode): error is EngagementError {
  return error instanceof EngagementError && (code === undefined || error.code === code);
}
