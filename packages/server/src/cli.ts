#!/usr/bin/env node
/**
 * Glucose Report CLI
 */

import { writeFile } from "fs/promises";
import { program } from "commander";
import { maskIdentifier } from "@glucose-report/core";
import { loadConfig } from "./config.js";
import { startServer } from "./server.js";
import { parseReportForm } from "./form.js";
import { generateReport } from "./report-pipeline.js";
import { askHidden } from "./prompt.js";

program
  .name("glucose-report")
  .description("Download Tidepool finger stick readings as a PDF table")
  .version("0.1.0");

program
  .command("serve")
  .description("Serve the report form over HTTP")
  .option("--port <port>", "Port to listen on (default: PORT or 3000)")
  .action(async (options: { port?: string }) => {
    if (options.port) {
      process.env.PORT = options.port;
    }
    const config = loadConfig();
    console.log(`Tidepool API: ${config.apiUrl}`);
    await startServer({ config });
  });

program
  .command("export")
  .description("Write one report to a PDF file")
  .requiredOption("--email <email>", "Tidepool account e-mail")
  .option("--start <date>", "First day (YYYY-MM-DD)")
  .option("--end <date>", "Last day (YYYY-MM-DD)")
  .option("--out <file>", "Output file", "glucose-report.pdf")
  .action(async (options: { email: string; start?: string; end?: string; out: string }) => {
    const config = loadConfig();

    try {
      const password = process.env.TIDEPOOL_PASSWORD || (await askHidden("Tidepool password: "));
      const form = new URLSearchParams({
        useremail: options.email,
        password,
        startdate: options.start ?? "",
        enddate: options.end ?? "",
      });
      const request = parseReportForm(form.toString());
      console.log(`Creating report for ${maskIdentifier(request.credentials.identifier)}...`);
      const { readings, report } = await generateReport(request, {
        client: { baseUrl: config.apiUrl, timeoutMs: config.timeoutMs },
      });
      await writeFile(options.out, report.pdf);
      console.log(`Wrote ${readings.length} readings to ${options.out}`);
    } catch (error) {
      console.error(`Export failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error("Error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
