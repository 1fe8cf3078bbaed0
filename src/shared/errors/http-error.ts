export interface HttpErrorBody {
  error: {
    code: string;
    message: string;
  };
}

export class HttpError extends Error {
  public readonly statusCode: number;
  public readonly code: string;

  public constructor(statusCode: number, message: string, code = "UNEXPECTED_ERROR") {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.code = code;
  }

  public static unauthorized(message: string, code = "UNAUTHORIZED"): HttpError {
    return new HttpError(401, message, code);
  }

  public toBody(): HttpErrorBody {
    return {
      error: {
        code: this.code,
        message: this.message
      }
    };
  }
}
