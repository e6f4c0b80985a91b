import { NextResponse } from "next/server";
import { ZodError } from "zod";

export type ErrorBody = { error: true; message: string };

/**
 * Base for every failure the API knows how to report. `publicMessage` is what
 * the client sees; `message` may carry upstream detail for the logs.
 */
export class AppError extends Error {
  readonly status: number;
  readonly publicMessage: string;

  constructor(message: string, status: number, publicMessage = message, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
    this.publicMessage = publicMessage;
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class UpstreamUnavailableError extends AppError {
  readonly service: string;
  readonly timedOut: boolean;

  constructor(service: string, detail: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    const timedOut = options.timedOut ?? false;
    super(
      `${service}: ${detail}`,
      timedOut ? 503 : 502,
      timedOut ? `${service} timed out. Please try again.` : `${service} is unavailable. Please try again.`,
      { cause: options.cause }
    );
    this.service = service;
    this.timedOut = timedOut;
  }
}

export class MalformedResponseError extends AppError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Malformed AI response: ${detail}`, 502, "Analysis failed. Please try again.", options);
  }
}

export class StorageUnavailableError extends AppError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Storage: ${detail}`, 503, "Storage is unavailable. Please try again.", options);
  }
}

export function isAbortError(e: unknown) {
  return e instanceof Error && (e.name === "AbortError" || e.name === "TimeoutError");
}

export function describeError(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

export function errorBody(message: string): ErrorBody {
  return { error: true, message };
}

export function errorResponse(e: unknown, scope: string) {
  if (e instanceof AppError) {
    const log = e.status >= 500 ? console.error : console.warn;
    log(`[${scope}] ${e.message}`);
    return NextResponse.json(errorBody(e.publicMessage), { status: e.status });
  }

  if (e instanceof ZodError) {
    const issue = e.issues[0];
    const where = issue?.path.length ? `${issue.path.join(".")}: ` : "";
    return NextResponse.json(errorBody(`${where}${issue?.message ?? "Invalid request"}`), { status: 400 });
  }

  if (e instanceof SyntaxError) {
    return NextResponse.json(errorBody("Request body must be valid JSON"), { status: 400 });
  }

  console.error(`[${scope}] unexpected error:`, e);
  return NextResponse.json(errorBody("Internal server error"), { status: 500 });
}
