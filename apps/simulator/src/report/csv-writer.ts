/**
 * CSV Writer - Write simulated swaps to a CSV file
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import type { StepRecord } from "../types";

/**
 * CSV header columns
 */
const CSV_HEADERS = [
  "scenario",
  "step",
  "ts",
  "side",
  "amount_in",
  "applied_in",
  "amount_out",
  "fee_bps",
  "mid",
  "outcome",
  "reason",
  "regime_flags",
  "used_fallback",
];

/**
 * Escape CSV value
 */
function escapeCsv(value: string | number | bigint | boolean | null): string {
  if (value === null) {
    return "";
  }

  const str = String(value);

  // Quote if it contains a comma, quote or newline
  if (str.includes(",") || str.includes('"') || str.includes("\n")) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

function stepToCsvRow(scenario: string, step: StepRecord): string {
  const values = [
    scenario,
    step.step,
    new Date(step.atSec * 1000).toISOString(),
    step.isBaseIn ? "base_in" : "quote_in",
    step.amountIn,
    step.appliedAmountIn,
    step.amountOut,
    step.feeBps,
    step.mid,
    step.outcome,
    step.reason,
    step.regimeFlags.join("|"),
    step.usedFallback,
  ];

  return values.map(escapeCsv).join(",");
}

/**
 * Generate CSV content as a string
 */
export function generateCsvContent(runs: { scenario: string; steps: StepRecord[] }[]): string {
  const lines: string[] = [CSV_HEADERS.join(",")];

  for (const run of runs) {
    for (const step of run.steps) {
      lines.push(stepToCsvRow(run.scenario, step));
    }
  }

  return lines.join("\n");
}

/**
 * Write steps of one or more runs to a CSV file, creating the directory if needed
 */
export function writeStepsCsv(runs: { scenario: string; steps: StepRecord[] }[], outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, generateCsvContent(runs), "utf-8");
}
