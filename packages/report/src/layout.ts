/**
 * Report page layout
 *
 * Pure pagination of readings into pages of table rows. The PDF renderer
 * draws exactly what this produces, so tests can check page content
 * without decoding PDF streams.
 *
 * All measurements are PDF points (72 per inch).
 */

import type { NormalizedReading } from "@glucose-report/core";

const INCH = 72;

/** One table column, bound to a reading field */
export interface ColumnSpec {
  header: string;
  field: keyof NormalizedReading;
  /** Cell width in points */
  width: number;
}

export interface ReportOptions {
  /** Title band text, repeated on every page */
  title: string;
  columns: ColumnSpec[];
  /** Page size in points [width, height] */
  pageSize: [number, number];
  /** Cell height in points */
  rowHeight: number;
  /** Top of the title band */
  titleTop: number;
  titleHeight: number;
  /** Top of the header row */
  tableTop: number;
  /** Rows stop this far above the page bottom */
  bottomMargin: number;
  /** Footer baseline box, measured up from the page bottom */
  footerOffset: number;
}

export const DEFAULT_REPORT_OPTIONS: ReportOptions = {
  title: "Glucose Values",
  columns: [
    { header: "Date", field: "date", width: 1.7 * INCH },
    { header: "Time", field: "time", width: 1.7 * INCH },
    { header: "Glucose value", field: "value", width: 1.7 * INCH },
  ],
  // US Letter
  pageSize: [8.5 * INCH, 11 * INCH],
  rowHeight: 0.3 * INCH,
  titleTop: 0.2 * INCH,
  titleHeight: 0.4 * INCH,
  tableTop: 0.7 * INCH,
  bottomMargin: 0.8 * INCH,
  footerOffset: 0.5 * INCH,
};

/** A laid-out page */
export interface ReportPage {
  /** 1-based */
  pageNumber: number;
  title: string;
  header: string[];
  rows: string[][];
  footer: string;
}

/**
 * Footer text for a page
 */
export function formatPageFooter(pageNumber: number, pageCount: number): string {
  return `Page ${pageNumber} / ${pageCount}`;
}

/**
 * Number of data rows that fit below the header row on one page
 */
export function rowsPerPage(options: ReportOptions = DEFAULT_REPORT_OPTIONS): number {
  const [, pageHeight] = options.pageSize;
  const available =
    pageHeight - options.bottomMargin - options.tableTop - options.rowHeight;
  const rows = Math.floor(available / options.rowHeight);
  if (rows < 1) {
    throw new Error("Page is too small to hold a single data row");
  }
  return rows;
}

/**
 * Lay out readings into pages, in input order.
 * No readings still yields one page with just the header row.
 */
export function layoutReport(
  readings: readonly NormalizedReading[],
  options: ReportOptions = DEFAULT_REPORT_OPTIONS
): ReportPage[] {
  const perPage = rowsPerPage(options);
  const header = options.columns.map((column) => column.header);
  const pageCount = Math.max(1, Math.ceil(readings.length / perPage));

  const pages: ReportPage[] = [];
  for (let index = 0; index < pageCount; index++) {
    const slice = readings.slice(index * perPage, (index + 1) * perPage);
    pages.push({
      pageNumber: index + 1,
      title: options.title,
      header,
      rows: slice.map((reading) => options.columns.map((column) => reading[column.field])),
      footer: formatPageFooter(index + 1, pageCount),
    });
  }
  return pages;
}
