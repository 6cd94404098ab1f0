/**
 * HTTP route handlers
 *
 * Transport-free: each handler takes a parsed request and returns a
 * response value, so the node:http server and the tests share one path.
 * Every failure becomes a response for this request only.
 */

import { isReportError, type AnyReportError } from "@glucose-report/core";
import { parseReportForm, type ReportRequest } from "./form.js";
import { generateReport, type PipelineOptions, type ReportResult } from "./report-pipeline.js";
import { renderHomePage, renderMessagePage, renderServiceErrorPage } from "./pages.js";
import { readStaticFile } from "./static-files.js";
import { RequestValidationError } from "./errors.js";
import type { ServerConfig } from "./config.js";

export interface HttpRequest {
  method: string;
  /** Path without query string */
  path: string;
  body: string;
}

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string | Buffer;
}

export interface HandlerContext {
  config: ServerConfig;
  /** Pipeline entry point (replaceable in tests) */
  generate?: (request: ReportRequest, options: PipelineOptions) => Promise<ReportResult>;
}

const STATIC_PREFIX = "/static/";

function html(statusCode: number, body: string): HttpResponse {
  return {
    statusCode,
    headers: { "Content-Type": "text/html; charset=utf-8" },
    body,
  };
}

function reportErrorResponse(error: AnyReportError): HttpResponse {
  switch (error.kind) {
    case "auth":
      return html(
        502,
        renderMessagePage("Sign-in failed", [
          "Tidepool did not accept the sign-in request.",
          `Status: ${error.status} ${error.statusText}`.trim(),
        ])
      );
    case "fetch":
      return html(
        502,
        renderMessagePage("Data request failed", [
          "Tidepool did not return your readings.",
          `Status: ${error.status} ${error.statusText}`.trim(),
        ])
      );
    case "service-reported":
      return html(200, renderServiceErrorPage(error.serviceError));
    case "malformed-payload":
      return html(
        502,
        renderMessagePage("Unexpected response", [
          "Tidepool answered in a format this report does not understand.",
          "This is not something you can fix; please try again later.",
        ])
      );
  }
}

/**
 * Map any failure of a report request to a response
 */
export function errorResponse(error: unknown): HttpResponse {
  if (error instanceof RequestValidationError) {
    return html(400, renderMessagePage("Please check the form", error.issues));
  }
  if (isReportError(error)) {
    console.error(`Report failed (${error.kind}): ${error.message}`);
    return reportErrorResponse(error);
  }
  console.error("Unexpected error:", error);
  return html(500, renderMessagePage("Sorry, something went wrong", ["Please try again."]));
}

async function handleReport(request: HttpRequest, context: HandlerContext): Promise<HttpResponse> {
  const generate = context.generate ?? generateReport;
  try {
    const reportRequest = parseReportForm(request.body);
    const { report } = await generate(reportRequest, {
      client: { baseUrl: context.config.apiUrl, timeoutMs: context.config.timeoutMs },
    });
    return {
      statusCode: 200,
      headers: {
        "Content-Type": "application/pdf",
        "Content-Disposition": 'inline; filename="glucose-report.pdf"',
        "Content-Length": String(report.pdf.length),
      },
      body: report.pdf,
    };
  } catch (error) {
    return errorResponse(error);
  }
}

async function handleStatic(path: string, context: HandlerContext): Promise<HttpResponse> {
  try {
    const file = await readStaticFile(context.config.staticDir, path.slice(STATIC_PREFIX.length));
    if (!file) {
      return html(404, renderMessagePage("Not found", [path]));
    }
    return { statusCode: 200, headers: { "Content-Type": file.contentType }, body: file.body };
  } catch (error) {
    return errorResponse(error);
  }
}

/**
 * Route a request
 */
export async function handleRequest(
  request: HttpRequest,
  context: HandlerContext
): Promise<HttpResponse> {
  if (request.path === "/" && request.method === "GET") {
    return html(200, renderHomePage());
  }

  if (request.path === "/opts") {
    if (request.method !== "POST") {
      return {
        ...html(405, renderMessagePage("Method not allowed", ["Submit the form on the home page."])),
        headers: { "Content-Type": "text/html; charset=utf-8", Allow: "POST" },
      };
    }
    return handleReport(request, context);
  }

  if (request.path.startsWith(STATIC_PREFIX) && request.method === "GET") {
    return handleStatic(request.path, context);
  }

  return html(404, renderMessagePage("Not found", [request.path]));
}
