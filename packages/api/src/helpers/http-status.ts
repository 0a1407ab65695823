import type { ContentfulStatusCode } from 'hono/utils/http-status';

const CONTENTLESS = new Set([101, 204, 205, 304]);

/**
 * Checks whether a status code may carry a response body.
 *
 * @example
 * ```typescript
 * isContentfulStatus(201) // true
 * isContentfulStatus(204) // false
 * ```
 */
export function isContentfulStatus(
  status: number,
): status is ContentfulStatusCode {
  return (
    Number.isInteger(status) &&
    status >= 100 &&
    status <= 599 &&
    !CONTENTLESS.has(status)
  );
}

/**
 * Status to write an error body with; codes that cannot carry one become 500.
 */
export function toContentfulStatus(status: number): ContentfulStatusCode {
  return isContentfulStatus(status) ? status : 500;
}
