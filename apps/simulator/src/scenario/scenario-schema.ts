/**
 * Scenario Schema - Stress scenario definitions
 *
 * Scenarios live in a JSON file; amounts are integer strings in token units.
 */

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { featureFlagsSchema } from "@dnmm/core";

import { readJsonFile } from "../config/read-json";
import type { SimulatorError } from "../types";

export const SCENARIO_NAMES = [
  "CALM",
  "DELTA_SOFT",
  "DELTA_HARD",
  "STALE_PRIMARY",
  "NEAR_FLOOR",
  "AOMQ_ON",
  "REBALANCE_JUMP",
] as const;

const amount = z
  .string()
  .regex(/^\d+$/, "expected an integer string")
  .transform(value => BigInt(value));

const price = z.string().regex(/^\d+(\.\d+)?$/, "expected a decimal price");
const bps = z.number().int().min(0).max(10_000);

const oracleScriptSchema = z.object({
  midPx: price,
  deltaBps: bps,
  spreadBps: bps,
  confBps: bps,
  primaryStale: z.boolean().optional(),
  secondaryStale: z.boolean().optional(),
  jump: z.object({ atStep: z.number().int().min(0), midPx: price }).optional(),
});

const flowSchema = z
  .object({
    minSize: amount,
    maxSize: amount,
    baseInShare: z.number().min(0).max(1),
  })
  .refine(flow => flow.minSize > 0n && flow.minSize <= flow.maxSize, {
    message: "flow sizes must satisfy 0 < minSize <= maxSize",
    path: ["minSize"],
  });

export const scenarioSchema = z.object({
  name: z.enum(SCENARIO_NAMES),
  description: z.string(),
  oracle: oracleScriptSchema,
  reserves: z.object({
    baseReserve: amount,
    quoteReserve: amount,
    /** Defaults to baseReserve */
    targetBaseStar: amount.optional(),
  }),
  featureFlags: featureFlagsSchema.partial().default({}),
  stepSec: z.number().int().positive().default(1),
  flow: flowSchema,
  manualRebalanceAtStep: z.number().int().min(0).optional(),
});

export const scenarioFileSchema = z
  .array(scenarioSchema)
  .refine(list => new Set(list.map(s => s.name)).size === list.length, { message: "duplicate scenario name" });

export type Scenario = z.infer<typeof scenarioSchema>;

/**
 * Parse and validate an already-decoded scenarios document
 */
export function parseScenarios(input: unknown): Result<Scenario[], SimulatorError> {
  const parsed = scenarioFileSchema.safeParse(input);
  if (!parsed.success) {
    return err({
      type: "CONFIG_ERROR",
      message: parsed.error.issues.map(issue => `${issue.path.map(String).join(".")}: ${issue.message}`).join("; "),
    });
  }
  return ok(parsed.data);
}

export function loadScenarios(path: string): Result<Scenario[], SimulatorError> {
  return readJsonFile(path).andThen(parseScenarios);
}

/**
 * Select one scenario by name, or all of them for "ALL"
 */
export function selectScenarios(all: Scenario[], name: string): Result<Scenario[], SimulatorError> {
  const wanted = name.toUpperCase();
  if (wanted === "ALL") return ok(all);

  const found = all.find(s => s.name === wanted);
  if (!found) {
    return err({
      type: "CONFIG_ERROR",
      message: `unknown scenario ${name}; expected one of ${all.map(s => s.name).join(", ")} or ALL`,
    });
  }
  return ok([found]);
}
