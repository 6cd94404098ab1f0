import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  AuthError,
  FetchError,
  MalformedPayloadError,
  ServiceReportedError,
} from "@glucose-report/core";
import { handleRequest, type HandlerContext, type HttpRequest } from "../handlers.js";
import { parseConfig } from "../config.js";
import type { ReportResult } from "../report-pipeline.js";

const config = parseConfig({ TIDEPOOL_API_URL: "http://localhost:9999", REQUEST_TIMEOUT_MS: "5000" });

const validForm = new URLSearchParams({
  useremail: "user@example.com",
  password: "test-pass",
  startdate: "2021-01-01",
  enddate: "",
  datatype: "smbg",
}).toString();

function post(body: string): HttpRequest {
  return { method: "POST", path: "/opts", body };
}

function get(path: string): HttpRequest {
  return { method: "GET", path, body: "" };
}

const fakeResult: ReportResult = {
  readings: [{ date: "2021-01-01", time: "08:00:00", value: "90" }],
  report: {
    pages: [],
    pdf: Buffer.from("%PDF-1.3 test"),
  },
};

describe("handleRequest", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("serves the form on /", async () => {
    const response = await handleRequest(get("/"), { config });

    expect(response.statusCode).toBe(200);
    expect(response.headers["Content-Type"]).toBe("text/html; charset=utf-8");
    expect(String(response.body)).toContain('<form method="post" action="/opts">');
  });

  it("returns the PDF for a valid form", async () => {
    const generate = vi.fn().mockResolvedValue(fakeResult);

    const response = await handleRequest(post(validForm), { config, generate });

    expect(response.statusCode).toBe(200);
    expect(response.headers["Content-Type"]).toBe("application/pdf");
    expect(response.headers["Content-Length"]).toBe("13");
    expect(response.body).toBe(fakeResult.report.pdf);
  });

  it("passes the parsed request and client settings to the pipeline", async () => {
    const generate = vi.fn().mockResolvedValue(fakeResult);

    await handleRequest(post(validForm), { config, generate });

    expect(generate).toHaveBeenCalledWith(
      {
        credentials: { identifier: "user@example.com", secret: "test-pass" },
        range: { start: "2021-01-01", end: undefined },
        subtype: "smbg",
      },
      { client: { baseUrl: "http://localhost:9999", timeoutMs: 5000 } }
    );
  });

  it("answers 400 with the field problems for an invalid form", async () => {
    const generate = vi.fn();

    const response = await handleRequest(post("useremail=&password=x"), { config, generate });

    expect(response.statusCode).toBe(400);
    expect(String(response.body)).toContain("<p>useremail: Required</p>");
    expect(generate).not.toHaveBeenCalled();
  });

  const failures: [string, Error, number, string][] = [
    ["AuthError", new AuthError(401, "Unauthorized"), 502, "<p>Status: 401 Unauthorized</p>"],
    ["FetchError", new FetchError(503, "Service Unavailable"), 502, "<p>Status: 503 Service Unavailable</p>"],
    [
      "MalformedPayloadError",
      new MalformedPayloadError("bad body", "<html>"),
      502,
      "<h1>Unexpected response</h1>",
    ],
    [
      "ServiceReportedError",
      new ServiceReportedError({ status: 403, id: "x", code: "invalid", message: "bad creds" }),
      200,
      "<dt>Message</dt><dd>bad creds</dd>",
    ],
    ["an unexpected error", new Error("disk full"), 500, "<h1>Sorry, something went wrong</h1>"],
  ];

  it.each(failures)("maps %s to a page", async (_name, error, statusCode, fragment) => {
    const generate = vi.fn().mockRejectedValue(error);

    const response = await handleRequest(post(validForm), { config, generate });

    expect(response.statusCode).toBe(statusCode);
    expect(response.headers["Content-Type"]).toBe("text/html; charset=utf-8");
    expect(String(response.body)).toContain(fragment);
  });

  it("escapes service error text", async () => {
    const generate = vi.fn().mockRejectedValue(
      new ServiceReportedError({ status: 400, id: "", code: "", message: "<b>no</b>" })
    );

    const response = await handleRequest(post(validForm), { config, generate });

    expect(String(response.body)).toContain("<dd>&lt;b&gt;no&lt;/b&gt;</dd>");
  });

  it("rejects GET on /opts", async () => {
    const response = await handleRequest(get("/opts"), { config });

    expect(response.statusCode).toBe(405);
    expect(response.headers.Allow).toBe("POST");
  });

  it("serves static files", async () => {
    const response = await handleRequest(get("/static/style.css"), { config });

    expect(response.statusCode).toBe(200);
    expect(response.headers["Content-Type"]).toBe("text/css; charset=utf-8");
    expect(String(response.body)).toContain("font-family: sans-serif;");
  });

  it("does not serve files outside the static directory", async () => {
    const context: HandlerContext = { config };

    expect((await handleRequest(get("/static/../package.json"), context)).statusCode).toBe(404);
    expect((await handleRequest(get("/static/%2e%2e/package.json"), context)).statusCode).toBe(
      404
    );
  });

  it("answers 404 for static paths with a NUL byte", async () => {
    const response = await handleRequest(get("/static/style.css%00.png"), { config });

    expect(response.statusCode).toBe(404);
  });

  it("answers 404 for missing static files and unknown paths", async () => {
    expect((await handleRequest(get("/static/missing.css"), { config })).statusCode).toBe(404);
    expect((await handleRequest(get("/nope"), { config })).statusCode).toBe(404);
  });
});
