/**
 * @glucose-report/server
 *
 * Report pipeline, HTTP surface and configuration
 */

export * from "./errors.js";
export * from "./config.js";
export * from "./form.js";
export * from "./report-pipeline.js";
export * from "./handlers.js";
export * from "./pages.js";
export * from "./static-files.js";
export * from "./server.js";
