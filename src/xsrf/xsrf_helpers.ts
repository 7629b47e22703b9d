/**
 * Helper functions for XSRF protection in templates.
 */

import { escapeHtml } from "../utils/html.ts";
import { TOKEN_KEY } from "./xsrf_plugin.ts";

/**
 * Generates a hidden input field carrying the XSRF token.
 *
 * The token must have been generated for the form's action host and path.
 *
 * @example
 * ```ts
 * const token = await plugin.generateToken("example.com", "/submit");
 * const html = `<form method="POST" action="/submit">
 *   ${xsrfInput(token, plugin.tokenField)}
 *   <button type="submit">Submit</button>
 * </form>`;
 * ```
 */
export function xsrfInput(token: string, fieldName: string = TOKEN_KEY): string {
  return `<input type="hidden" name="${escapeHtml(fieldName)}" value="${escapeHtml(token)}">`;
}
