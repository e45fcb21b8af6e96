/**
 * Row Mappers - Engine records <-> database rows
 *
 * Amounts are stored as numeric and come back from pg as strings;
 * they are parsed back into bigint here. Pure (no I/O).
 */

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  describeEngineError,
  validatePoolConfig,
  type SwapRecord,
  type TargetUpdatedRecord,
} from "@dnmm/core";
import type {
  NewRebalanceEventRow,
  NewSwapEventRow,
  PoolConfigRow,
  RebalanceEventRow,
  SwapEventRow,
} from "@dnmm/db";

import type { StoredPoolConfig } from "../interfaces/pool-config-repository";
import type { RepositoryError } from "../types";

const INTEGER = /^-?\d+$/;

const reasonCodeSchema = z.enum(["OK", "PARTIAL_FILL_FLOOR", "AOMQ_CLAMP", "FALLBACK_MODE", "SOFT_DIVERGENCE"]);
const triggerSchema = z.enum(["auto", "manual"]);

function invalidRow(message: string): RepositoryError {
  return { type: "INVALID_ROW", message };
}

function parseInteger(field: string, value: string): Result<bigint, RepositoryError> {
  if (!INTEGER.test(value)) return err(invalidRow(`${field} is not an integer: ${value}`));
  return ok(BigInt(value));
}

function toSec(ts: Date): number {
  return Math.floor(ts.getTime() / 1000);
}

function toTs(atSec: number): Date {
  return new Date(atSec * 1000);
}

// ─────────────────────────────────────────────────────────────────────────────
// pool_config
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validates the stored jsonb against the pool config schema
 */
export function poolConfigFromRow(row: PoolConfigRow): Result<StoredPoolConfig, RepositoryError> {
  return validatePoolConfig(row.config)
    .mapErr(error => invalidRow(`pool_config ${row.id}: ${describeEngineError(error)}`))
    .map(config => ({
      id: row.id,
      poolId: row.poolId,
      isCurrent: row.isCurrent,
      createdAt: row.createdAt,
      createdBy: row.createdBy,
      config,
      comment: row.comment,
    }));
}

// ─────────────────────────────────────────────────────────────────────────────
// rebalance_event
// ─────────────────────────────────────────────────────────────────────────────

export function rebalanceEventToRow(poolId: string, record: TargetUpdatedRecord): NewRebalanceEventRow {
  return {
    ts: toTs(record.atSec),
    poolId,
    trigger: record.trigger,
    previousTarget: record.previousTarget.toString(),
    newTarget: record.newTarget.toString(),
    priceWad: record.priceWad.toString(),
    blockRef: record.blockRef,
  };
}

export function rebalanceEventFromRow(row: RebalanceEventRow): Result<TargetUpdatedRecord, RepositoryError> {
  const trigger = triggerSchema.safeParse(row.trigger);
  if (!trigger.success) return err(invalidRow(`unknown rebalance trigger: ${row.trigger}`));

  return parseInteger("previous_target", row.previousTarget).andThen(previousTarget =>
    parseInteger("new_target", row.newTarget).andThen(newTarget =>
      parseInteger("price_wad", row.priceWad).map(
        (priceWad): TargetUpdatedRecord => ({
          type: "TARGET_UPDATED",
          trigger: trigger.data,
          previousTarget,
          newTarget,
          priceWad,
          atSec: toSec(row.ts),
          blockRef: row.blockRef,
        }),
      ),
    ),
  );
}

// ─────────────────────────────────────────────────────────────────────────────
// swap_event
// ─────────────────────────────────────────────────────────────────────────────

export function swapEventToRow(poolId: string, record: SwapRecord): NewSwapEventRow {
  return {
    ts: toTs(record.atSec),
    poolId,
    isBaseIn: record.isBaseIn,
    requestedAmountIn: record.requestedAmountIn.toString(),
    appliedAmountIn: record.appliedAmountIn.toString(),
    amountOut: record.amountOut.toString(),
    feeBps: record.feeBpsUsed,
    midWad: record.midUsed.toString(),
    reason: record.reason,
    usedFallback: record.usedFallback,
    regimeBitmask: record.regimeBitmask,
    blockRef: record.blockRef,
  };
}

export function swapEventFromRow(row: SwapEventRow): Result<SwapRecord, RepositoryError> {
  const reason = reasonCodeSchema.safeParse(row.reason);
  if (!reason.success) return err(invalidRow(`unknown reason code: ${row.reason}`));

  return parseInteger("requested_amount_in", row.requestedAmountIn).andThen(requestedAmountIn =>
    parseInteger("applied_amount_in", row.appliedAmountIn).andThen(appliedAmountIn =>
      parseInteger("amount_out", row.amountOut).andThen(amountOut =>
        parseInteger("mid_wad", row.midWad).map(
          (midUsed): SwapRecord => ({
            type: "SWAP_SETTLED",
            isBaseIn: row.isBaseIn,
            requestedAmountIn,
            appliedAmountIn,
            amountOut,
            feeBpsUsed: row.feeBps,
            midUsed,
            reason: reason.data,
            usedFallback: row.usedFallback,
            regimeBitmask: row.regimeBitmask,
            atSec: toSec(row.ts),
            blockRef: row.blockRef,
          }),
        ),
      ),
    ),
  );
}

/**
 * Map every row, failing on the first invalid one
 */
export function mapRows<Row, T>(
  rows: Row[],
  mapper: (row: Row) => Result<T, RepositoryError>,
): Result<T[], RepositoryError> {
  const out: T[] = [];
  for (const row of rows) {
    const mapped = mapper(row);
    if (mapped.isErr()) return err(mapped.error);
    out.push(mapped.value);
  }
  return ok(out);
}
