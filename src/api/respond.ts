import { Response } from "express";
import { isApiError } from "../domain/errors";

export interface ErrorResponse {
  error: string;
}

/**
 * Send a route failure. ApiErrors carry their own status and message;
 * anything else is logged and reported as a 500 with the given message.
 */
export function sendError(res: Response, error: unknown, failureMessage: string): Response {
  if (isApiError(error)) {
    const body: ErrorResponse = { error: error.message };
    return res.status(error.status).json(body);
  }

  console.error(`${failureMessage}:`, error);
  const body: ErrorResponse = { error: failureMessage };
  return res.status(500).json(body);
}

/**
 * A single string from a query or body value, or undefined.
 * Repeated query parameters use the first occurrence.
 */
export function readString(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === "string") {
    return value[0];
  }
  return undefined;
}

/**
 * The JSON body as a plain object (empty if absent or not an object)
 */
export function readBody(body: unknown): Record<string, unknown> {
  if (typeof body === "object" && body !== null && !Array.isArray(body)) {
    return Object.fromEntries(Object.entries(body));
  }
  return {};
}
