/**
 * Engine Error Taxonomy
 *
 * Every failure aborts the whole operation with no partial mutation.
 * Errors travel through neverthrow `Result`, never as exceptions.
 */

import type { Amount, Bps, Sec, SourceTag } from "./types";

export type EngineError =
  | { type: "MID_UNSET"; message: string }
  | { type: "ORACLE_STALE"; source: SourceTag; ageSec: Sec; maxAgeSec: Sec }
  | { type: "DIVERGENCE_HARD"; deltaBps: Bps; hardBps: Bps }
  | { type: "FLOOR_BREACH"; reserve: Amount; floor: Amount }
  | { type: "RECENTER_COOLDOWN"; remainingSec: Sec }
  | { type: "RECENTER_THRESHOLD"; kind: "PRICE_MOVE" | "TARGET_CHANGE"; observedBps: Bps; thresholdBps: Bps }
  | { type: "PREVIEW_SNAPSHOT_STALE"; ageSec: Sec; maxAgeSec: Sec }
  | { type: "INVALID_CONFIG"; issues: string[] }
  | { type: "INVALID_AMOUNT"; message: string }
  | { type: "SLIPPAGE"; amountOut: Amount; minAmountOut: Amount }
  | { type: "DEADLINE_EXPIRED"; deadlineSec: Sec; nowSec: Sec };

export type EngineErrorType = EngineError["type"];

/**
 * Render an engine error as a single log line
 */
export function describeEngineError(error: EngineError): string {
  switch (error.type) {
    case "MID_UNSET":
      return `MID_UNSET: ${error.message}`;
    case "ORACLE_STALE":
      return `ORACLE_STALE: ${error.source} age ${error.ageSec}s > ${error.maxAgeSec}s`;
    case "DIVERGENCE_HARD":
      return `DIVERGENCE_HARD: delta ${error.deltaBps}bps > ${error.hardBps}bps`;
    case "FLOOR_BREACH":
      return `FLOOR_BREACH: reserve ${error.reserve} at floor ${error.floor}`;
    case "RECENTER_COOLDOWN":
      return `RECENTER_COOLDOWN: ${error.remainingSec}s remaining`;
    case "RECENTER_THRESHOLD":
      return `RECENTER_THRESHOLD: ${error.kind} ${error.observedBps}bps < ${error.thresholdBps}bps`;
    case "PREVIEW_SNAPSHOT_STALE":
      return `PREVIEW_SNAPSHOT_STALE: age ${error.ageSec}s > ${error.maxAgeSec}s`;
    case "INVALID_CONFIG":
      return `INVALID_CONFIG: ${error.issues.join("; ")}`;
    case "INVALID_AMOUNT":
      return `INVALID_AMOUNT: ${error.message}`;
    case "SLIPPAGE":
      return `SLIPPAGE: amountOut ${error.amountOut} < minAmountOut ${error.minAmountOut}`;
    case "DEADLINE_EXPIRED":
      return `DEADLINE_EXPIRED: now ${error.nowSec} > deadline ${error.deadlineSec}`;
  }
}
