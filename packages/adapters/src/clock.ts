/**
 * Clock - Manually advanced `Clock` for simulation and tests
 */

import type { Clock } from "@dnmm/core";

/**
 * Manually advanced time for simulation and tests
 */
export class ManualClock implements Clock {
  private now: number;
  private block: number;

  constructor(startSec: number, startBlock = 1) {
    this.now = startSec;
    this.block = startBlock;
  }

  /**
   * Move time forward; each advance is one new block
   */
  advance(seconds: number): void {
    this.now += seconds;
    this.block += 1;
  }

  nowSec(): number {
    return this.now;
  }

  blockRef(): number {
    return this.block;
  }

  nowDate(): Date {
    return new Date(this.now * 1000);
  }
}
