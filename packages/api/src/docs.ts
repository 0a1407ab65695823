import { SwaggerUI } from '@hono/swagger-ui';
import { html, raw } from 'hono/html';
import type { HtmlEscapedString } from 'hono/utils/html';

export interface SwaggerPageOptions {
  /** Page title; escaped into the document head */
  title: string;
  /** Where the viewer fetches the OpenAPI document from */
  specUrl: string;
}

/**
 * Standalone Swagger UI page for the generated document.
 *
 * @example
 * ```typescript
 * app.get('/docs', (c) =>
 *   c.html(renderSwaggerUI({ title: 'Todo API', specUrl: '/openapi.json' })),
 * );
 * ```
 */
export function renderSwaggerUI({
  title,
  specUrl,
}: SwaggerPageOptions): HtmlEscapedString | Promise<HtmlEscapedString> {
  return html`<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${title}</title>
  </head>
  <body>
    ${raw(SwaggerUI({ url: specUrl }))}
  </body>
</html>`;
}
