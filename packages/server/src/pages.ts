/**
 * HTML pages: the request form and the message/error screens
 */

import { SUPPORTED_SUBTYPE, type ServiceError } from "@glucose-report/core";
import { escapeHtml } from "./html.js";

function layout(title: string, content: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
  <link rel="stylesheet" href="/static/style.css">
</head>
<body>
  <main>
${content}
  </main>
</body>
</html>
`;
}

/**
 * Home page with the report options form
 */
export function renderHomePage(): string {
  return layout(
    "Glucose Report",
    `    <h1>Glucose Report</h1>
    <p>Sign in with your Tidepool account to download your finger stick readings as a PDF.</p>
    <form method="post" action="/opts">
      <label>E-mail <input type="email" name="useremail" required autocomplete="username"></label>
      <label>Password <input type="password" name="password" required autocomplete="current-password"></label>
      <label>Start date (optional) <input type="date" name="startdate"></label>
      <label>End date (optional) <input type="date" name="enddate"></label>
      <label>Data type
        <select name="datatype">
          <option value="${SUPPORTED_SUBTYPE}" selected>Finger sticks (${SUPPORTED_SUBTYPE})</option>
        </select>
      </label>
      <button type="submit">Create report</button>
    </form>`
  );
}

/**
 * General purpose message screen
 */
export function renderMessagePage(heading: string, lines: readonly string[]): string {
  const paragraphs = lines.map((line) => `    <p>${escapeHtml(line)}</p>`).join("\n");
  return layout(
    heading,
    `    <h1>${escapeHtml(heading)}</h1>
${paragraphs}
    <p><a href="/">Back</a></p>`
  );
}

/**
 * Error reported by Tidepool itself (e.g. bad credentials)
 */
export function renderServiceErrorPage(error: ServiceError): string {
  return layout(
    "Tidepool error",
    `    <h1>Tidepool returned an error</h1>
    <dl>
      <dt>Status</dt><dd>${error.status}</dd>
      <dt>Id</dt><dd>${escapeHtml(error.id)}</dd>
      <dt>Code</dt><dd>${escapeHtml(error.code)}</dd>
      <dt>Message</dt><dd>${escapeHtml(error.message)}</dd>
    </dl>
    <p>Check your e-mail, password and dates, then <a href="/">try again</a>.</p>`
  );
}
