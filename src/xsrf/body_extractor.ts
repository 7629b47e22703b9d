/**
 * Reads a single form field from a request body without consuming it.
 */

import { logger } from "../utils/logger.ts";
import type { FieldExtraction } from "./types.ts";

const URL_ENCODED = "application/x-www-form-urlencoded";
const MULTIPART = "multipart/form-data";

const NOT_FOUND: FieldExtraction = { found: false };

/**
 * Media type of a Content-Type header value, lowercased, parameters dropped.
 */
export function mediaType(contentType: string | null): string | null {
  if (!contentType) {
    return null;
  }
  const type = contentType.split(";", 1)[0].trim().toLowerCase();
  return type.length > 0 ? type : null;
}

/**
 * The request being validated together with its cached form parser.
 * Hono's `HonoRequest` (`c.req`) fits this shape.
 */
export interface FormBodySource {
  raw: Request;
  formData(): Promise<FormData>;
}

/**
 * Extract the first value of a form field from a url-encoded or multipart
 * request body.
 *
 * The body is read from a clone, so the original request can still be read
 * by later handlers. When an earlier middleware already consumed the body
 * through `c.req.parseBody()` or `c.req.formData()`, the field is read from
 * that cached form instead. Any other content type, a body that fails to
 * parse, a missing field, a file part and an empty value all come back as
 * not found.
 */
export async function extractFormField(
  source: FormBodySource,
  fieldName: string,
): Promise<FieldExtraction> {
  const request = source.raw;
  const type = mediaType(request.headers.get("Content-Type"));
  if (type !== URL_ENCODED && type !== MULTIPART) {
    return NOT_FOUND;
  }

  let value: string | null;
  try {
    if (request.bodyUsed) {
      logger.debug(`Form field ${fieldName}: reading from the cached request body`);
      value = textValue((await source.formData()).get(fieldName));
    } else {
      // Clone the request to avoid consuming the body
      const clonedRequest = request.clone();
      value = type === URL_ENCODED
        ? new URLSearchParams(await clonedRequest.text()).get(fieldName)
        : textValue((await clonedRequest.formData()).get(fieldName));
    }
  } catch (error) {
    logger.debug(`Form field ${fieldName}: ${type} body could not be parsed`, error);
    return NOT_FOUND;
  }

  if (value === null || value === "") {
    return NOT_FOUND;
  }
  return { found: true, value };
}

function textValue(entry: FormDataEntryValue | null): string | null {
  return typeof entry === "string" ? entry : null;
}
