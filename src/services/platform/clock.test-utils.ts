/**
 * Test utilities for Clock.
 */
import type { Clock } from "./clock";

/**
 * Clock fixed at a given time, advanced manually.
 */
export class ManualClock implements Clock {
  constructor(private seconds: number) {}

  nowSeconds(): number {
    return this.seconds;
  }

  advance(seconds: number): void {
    this.seconds += seconds;
  }
}
