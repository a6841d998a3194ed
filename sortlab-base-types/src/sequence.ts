/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022 trebco, llc. 
 * info@treb.app
 * 
 */

/**
 * a sequence is an ordered, fixed-length list of signed 32-bit integers.
 * duplicates are allowed. the int32 range is enforced where text is
 * parsed into a sequence, the algorithms assume it.
 */
export type Sequence = number[];

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

/**
 * instrumentation for the comparison sorts. pass one in via options and
 * the algorithm increments it; nothing is counted otherwise.
 */
export interface SortCounters {
  comparisons: number;
  swaps: number;
}

export const CreateCounters = (): SortCounters => {
  return { comparisons: 0, swaps: 0 };
};

/**
 * recursion strategy for the in-place sorts. `iterative` replaces the
 * recursion with an explicit work stack (or a loop) and produces the
 * same result.
 */
export type Strategy = 'recursive' | 'iterative';

export const IsStrategy = (value: unknown): value is Strategy => {
  return value === 'recursive' || value === 'iterative';
};

export const IsInt32 = (value: number): boolean => {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
};

/** exchange two elements. counts a swap if counters are attached. */
export const Swap = (seq: Sequence, i: number, j: number, counters?: SortCounters): void => {
  const temp = seq[i];
  seq[i] = seq[j];
  seq[j] = temp;
  if (counters) {
    counters.swaps++;
  }
};

/** non-decreasing check */
export const IsSorted = (seq: readonly number[]): boolean => {
  for (let i = 0; i < seq.length - 1; i++) {
    if (seq[i] > seq[i + 1]) {
      return false;
    }
  }
  return true;
};

/**
 * largest element. callers must not pass an empty sequence; every
 * caller in the suite returns early for size <= 1.
 */
export const FindMax = (seq: readonly number[]): number => {
  let max = seq[0];
  for (let i = 1; i < seq.length; i++) {
    if (seq[i] > max) {
      max = seq[i];
    }
  }
  return max;
};

/** render as `[a, b, c]` */
export const FormatSequence = (seq: readonly number[]): string => {
  return `[${seq.join(', ')}]`;
};
