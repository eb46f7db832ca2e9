#!/usr/bin/env node
/**
 * Print the chart report for a chart JSON file.
 *
 * Usage:
 *   npx tsx natal/tools/printChartReport.ts <chart.json>
 *   NATAL_INTERPRETATION_SOURCE=supabase npx tsx natal/tools/printChartReport.ts <chart.json>
 */

import "dotenv/config";
import fs from "node:fs";
import { pathToFileURL } from "node:url";
import { selectInterpretationStore } from "../interpretation/selectInterpretationStore.js";
import { buildChartReport, type ChartReport } from "../report/buildChartReport.js";

export async function printChartReport(chartPath: string): Promise<ChartReport> {
  const raw = fs.readFileSync(chartPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(
      `Failed to parse chart JSON (${chartPath}): ${
        err instanceof Error ? err.message : String(err)
      }`
    );
  }
  return buildChartReport(parsed, selectInterpretationStore());
}

function usage() {
  console.error("Usage: tsx natal/tools/printChartReport.ts <chart.json>");
}

async function main() {
  const chartPath = process.argv[2];
  if (!chartPath) {
    usage();
    process.exit(1);
  }

  const report = await printChartReport(chartPath);
  console.log(JSON.stringify(report, null, 2));
}

// Run CLI if invoked directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    console.error("Error building chart report:", err);
    process.exit(1);
  });
}
