export type ErrorStatus = 400 | 404 | 405 | 422 | 500;

export const ERROR_MESSAGES: Record<ErrorStatus, string> = {
  400: "Bad Request",
  404: "Resource Not Found",
  405: "Method Not Allowed",
  422: "Unprocessable",
  500: "Internal Server Error",
};

/**
 * Error carrying the HTTP status it should be answered with. `detail` is for
 * logs only; clients always get the fixed message for the status.
 */
export class ApiError extends Error {
  public readonly status: ErrorStatus;
  public readonly detail?: string;

  public constructor(status: ErrorStatus, detail?: string) {
    super(detail ? `${ERROR_MESSAGES[status]}: ${detail}` : ERROR_MESSAGES[status]);
    this.name = "ApiError";
    this.status = status;
    this.detail = detail;
  }

  public static badRequest(detail?: string): ApiError {
    return new ApiError(400, detail);
  }

  public static notFound(detail?: string): ApiError {
    return new ApiError(404, detail);
  }

  public static methodNotAllowed(detail?: string): ApiError {
    return new ApiError(405, detail);
  }

  public static unprocessable(detail?: string): ApiError {
    return new ApiError(422, detail);
  }
}
