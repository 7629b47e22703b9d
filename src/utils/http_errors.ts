import type { Context } from "hono";

/**
 * Statuses the guards in this package reply with.
 */
export type GuardErrorStatus = 401 | 403 | 500;

const STATUS_TEXT: Record<GuardErrorStatus, string> = {
  401: "Unauthorized",
  403: "Forbidden",
  500: "Internal Server Error",
};

/**
 * Reply with a plain-text error body (the status text plus a newline).
 *
 * Content-Type and X-Content-Type-Options are set directly rather than
 * through header claims: an error reply replaces whatever the pipeline
 * prepared.
 */
export function plainTextError(c: Context, status: GuardErrorStatus): Response {
  return c.body(`${STATUS_TEXT[status]}\n`, status, {
    "Content-Type": "text/plain; charset=utf-8",
    "X-Content-Type-Options": "nosniff",
  });
}
