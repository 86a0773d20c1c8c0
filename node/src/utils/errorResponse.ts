/**
 * Error body shared by every endpoint: a stable machine-readable code plus a human message.
 */
export interface ErrorResponse {
  error: string;
  message: string;
  issues?: Array<{ path: string; message: string }>;
}

export function createErrorResponse(
  error: string,
  message: string,
  issues?: Array<{ path: string; message: string }>,
): ErrorResponse {
  return {
    error,
    message,
    ...(issues && issues.length > 0 && { issues }),
  };
}
