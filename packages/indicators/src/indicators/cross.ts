/**
 * Cross - detects when two lines swap sides
 *
 * A cross is any step where the short (reactive) line changes from below
 * the long (historic) line to at or above it, or back. It is golden when
 * the short line ends strictly above, death when strictly below; ending on
 * a tie is a cross with neither direction.
 */

import { toNum } from '@rollta/shared';
import type { Num, Sample } from '@rollta/shared';
import type { Next, Value } from '../types.js';

/**
 * Line a Cross can follow
 */
export type CrossLine = Value & Next<Num, unknown>;

export class Cross<S extends CrossLine, L extends CrossLine = S> implements Next<Sample, boolean> {
  private hasCrossed = false;

  private constructor(
    private readonly shortLine: S,
    private readonly longLine: L
  ) {}

  /**
   * Follow two lines, both owned by the cross from here on
   *
   * @param shortLine - Shorter or more reactive line
   * @param longLine - Longer or more historic line
   */
  static create<S extends CrossLine, L extends CrossLine = S>(
    shortLine: S,
    longLine: L
  ): Cross<S, L> {
    return new Cross(shortLine, longLine);
  }

  /**
   * Whether the last step changed sides; reset on every step
   */
  crossed(): boolean {
    return this.hasCrossed;
  }

  isGolden(): boolean {
    return this.hasCrossed && this.shortLine.value() > this.longLine.value();
  }

  isDeath(): boolean {
    return this.hasCrossed && this.shortLine.value() < this.longLine.value();
  }

  /**
   * Advance both lines
   *
   * @returns Whether the lines crossed on this step
   */
  next(input: Sample): boolean {
    const x = toNum(input);
    const wasBelow = this.isBelow();

    this.shortLine.next(x);
    this.longLine.next(x);

    this.hasCrossed = wasBelow !== this.isBelow();
    return this.hasCrossed;
  }

  private isBelow(): boolean {
    return this.shortLine.value() < this.longLine.value();
  }
}
