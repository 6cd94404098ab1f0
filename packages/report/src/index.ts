/**
 * @glucose-report/report
 *
 * Paginated glucose table as a PDF
 */

export * from "./layout.js";
export * from "./pdf-renderer.js";
