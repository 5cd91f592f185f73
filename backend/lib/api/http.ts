/** Request shape shared by the handlers; the express layer builds it. */
export interface ApiEvent {
  headers?: Record<string, string | undefined>;
  body?: string | null;
  pathParameters?: Record<string, string | undefined>;
}

export interface ApiResponse {
  statusCode: number;
  body: string;
  /** Set by the download handler; the server streams this file. */
  filePath?: string;
}

export function json(statusCode: number, payload: unknown): ApiResponse {
  return { statusCode, body: JSON.stringify(payload) };
}

export function header(event: ApiEvent, name: string): string | undefined {
  const value = event.headers?.[name] ?? event.headers?.[name.toLowerCase()];
  return value || undefined;
}
