import { isConfigurationError, isValidationError, ValidationError } from "./errors";
import { extractErrorMessage } from "./http";

export type ApiErrorKind = "validation" | "configuration" | "internal";

export interface ApiErrorBody {
  error: string;
  kind: ApiErrorKind;
  issues?: string[];
  remediation?: string;
}

export interface ApiErrorResponse {
  status: number;
  body: ApiErrorBody;
}

/** Validation and configuration problems are the caller's to fix (400); the rest is ours (500). */
export function toApiError(err: unknown, tag: string): ApiErrorResponse {
  if (isValidationError(err)) {
    return { status: 400, body: { error: err.message, kind: "validation", issues: err.issues } };
  }
  if (isConfigurationError(err)) {
    return {
      status: 400,
      body: { error: err.message, kind: "configuration", remediation: err.remediation },
    };
  }
  const message = extractErrorMessage(err);
  console.error(`[${tag}] unexpected error: ${message}`);
  return { status: 500, body: { error: message, kind: "internal" } };
}

export async function readJsonBody(req: Request): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    throw new ValidationError("Request body must be valid JSON.");
  }
}
