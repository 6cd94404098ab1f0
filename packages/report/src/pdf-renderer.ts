/**
 * PDF report renderer
 *
 * Draws the laid-out pages with pdfkit. Each render() call owns its own
 * document and buffer, so concurrent renders never share drawing state.
 * The header is drawn from the page-start ("pageAdded") callback; footers
 * are drawn over the buffered pages at the end, once the page count is known.
 */

import PDFDocument from "pdfkit";
import type { NormalizedReading } from "@glucose-report/core";
import {
  DEFAULT_REPORT_OPTIONS,
  formatPageFooter,
  layoutReport,
  type ReportOptions,
  type ReportPage,
} from "./layout.js";

const FONTS = {
  title: { name: "Helvetica-Bold", size: 15 },
  header: { name: "Helvetica-Bold", size: 12 },
  cell: { name: "Helvetica", size: 12 },
  footer: { name: "Helvetica-Oblique", size: 8 },
} as const;

const BORDER_WIDTH = 0.5;

export interface RenderedReport {
  pages: ReportPage[];
  /** The finished PDF */
  pdf: Buffer;
}

export class ReportRenderer {
  private readonly options: ReportOptions;

  constructor(options: Partial<ReportOptions> = {}) {
    this.options = { ...DEFAULT_REPORT_OPTIONS, ...options };
  }

  /**
   * Render readings to an in-memory PDF
   */
  async render(readings: readonly NormalizedReading[]): Promise<RenderedReport> {
    const pages = layoutReport(readings, this.options);
    const doc = new PDFDocument({
      size: this.options.pageSize,
      margin: 0,
      autoFirstPage: false,
      bufferPages: true,
      info: { Title: this.options.title },
    });

    const chunks: Buffer[] = [];
    const finished = new Promise<Buffer>((resolve, reject) => {
      doc.on("data", (chunk: Buffer) => chunks.push(chunk));
      doc.on("end", () => resolve(Buffer.concat(chunks)));
      doc.on("error", reject);
    });

    doc.on("pageAdded", () => this.drawPageHeader(doc));

    for (const page of pages) {
      doc.addPage();
      page.rows.forEach((row, index) => {
        const top = this.options.tableTop + this.options.rowHeight * (index + 1);
        this.drawRow(doc, row, top, FONTS.cell);
      });
    }

    // Page count is only final now
    const range = doc.bufferedPageRange();
    for (let index = 0; index < range.count; index++) {
      doc.switchToPage(range.start + index);
      this.drawFooter(doc, formatPageFooter(index + 1, range.count));
    }

    doc.end();
    const pdf = await finished;

    console.log(
      `Rendered ${readings.length} readings on ${range.count} page(s), ${pdf.length} bytes`
    );
    return { pages, pdf };
  }

  private tableLeft(): number {
    const [pageWidth] = this.options.pageSize;
    const tableWidth = this.options.columns.reduce((sum, column) => sum + column.width, 0);
    return (pageWidth - tableWidth) / 2;
  }

  private drawPageHeader(doc: PDFKit.PDFDocument): void {
    const [pageWidth] = this.options.pageSize;
    doc.font(FONTS.title.name).fontSize(FONTS.title.size);
    const { titleTop, titleHeight } = this.options;
    doc.text(this.options.title, 0, this.centeredTextY(doc, titleTop, titleHeight), {
      width: pageWidth,
      align: "center",
      lineBreak: false,
    });

    this.drawRow(
      doc,
      this.options.columns.map((column) => column.header),
      this.options.tableTop,
      FONTS.header
    );
  }

  private drawRow(
    doc: PDFKit.PDFDocument,
    cells: readonly string[],
    top: number,
    font: { name: string; size: number }
  ): void {
    const { rowHeight, columns } = this.options;
    doc.font(font.name).fontSize(font.size);

    let left = this.tableLeft();
    cells.forEach((text, index) => {
      const width = columns[index]?.width ?? 0;
      doc.lineWidth(BORDER_WIDTH).rect(left, top, width, rowHeight).stroke();
      doc.text(text, left, this.centeredTextY(doc, top, rowHeight), {
        width,
        align: "center",
        lineBreak: false,
      });
      left += width;
    });
  }

  private drawFooter(doc: PDFKit.PDFDocument, text: string): void {
    const [pageWidth, pageHeight] = this.options.pageSize;
    doc.font(FONTS.footer.name).fontSize(FONTS.footer.size);
    const top = pageHeight - this.options.footerOffset;
    doc.text(text, 0, this.centeredTextY(doc, top, this.options.titleHeight), {
      width: pageWidth,
      align: "center",
      lineBreak: false,
    });
  }

  private centeredTextY(doc: PDFKit.PDFDocument, top: number, height: number): number {
    return top + (height - doc.currentLineHeight()) / 2;
  }
}
