export interface HttpClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  /** Name used in log categories and error messages */
  providerName: string;
  retries?: number | undefined;
  timeout?: number | undefined;
}

export interface HttpRequestOptions {
  headers?: Record<string, string> | undefined;
  timeout?: number | undefined;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class ResponseValidationError extends Error {
  constructor(
    message: string,
    public readonly providerName: string,
    public readonly endpoint: string,
    public readonly validationIssues: { message: string; path: string }[],
    public readonly truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseValidationError';
  }
}
