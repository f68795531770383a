import { html } from "hono/html";
import type { HtmlEscapedString } from "hono/utils/html";

export type Html = HtmlEscapedString | Promise<HtmlEscapedString>;

export function layout(title: string, body: Html): Html {
  return html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${title} - Reading Log</title>
  </head>
  <body>
    <main>${body}</main>
  </body>
</html>`;
}

export function statusPage(
  shortTitle: string,
  message: Html | string,
): Html {
  return layout(
    shortTitle,
    html`<h1>${shortTitle}</h1>
      <div class="message">${message}</div>`,
  );
}

export function errorList(errors: string[]): Html | string {
  if (errors.length === 0) {
    return "";
  }
  return html`<ul class="errors">
    ${errors.map((error) => html`<li>${error}</li>`)}
  </ul>`;
}
