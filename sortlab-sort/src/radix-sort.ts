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

import { AllocateBuffer, AllocateCounts, FindMax, type Sequence } from 'sortlab-base-types';
import type { StableSortOptions } from './sort-options';
import { Lanes } from './lanes';

/** base-10 */
export const RADIX = 10;

const Digit = (value: number, exp: number) => Math.floor(value / exp) % RADIX;

/**
 * one stable counting pass keyed by the digit at exp (1, 10, 100...).
 *
 * the source is scanned from the last index to the first and each
 * digit's cumulative count is decremented before writing. that order
 * keeps equal digits in their current relative order, and stability per
 * pass is what makes the whole LSD sort correct.
 */
export const CountingSortByDigit = (lanes: number[][], exp: number): void => {

  const keys = lanes[0];
  const size = keys.length;
  const count = AllocateCounts(RADIX);
  const output = lanes.map(() => AllocateBuffer(size));

  for (let i = 0; i < size; i++) {
    count[Digit(keys[i], exp)]++;
  }

  // cumulative

  for (let d = 1; d < RADIX; d++) {
    count[d] += count[d - 1];
  }

  for (let i = size - 1; i >= 0; i--) {
    const position = --count[Digit(keys[i], exp)];
    for (let lane = 0; lane < lanes.length; lane++) {
      output[lane][position] = lanes[lane][i];
    }
  }

  for (let lane = 0; lane < lanes.length; lane++) {
    const target = lanes[lane];
    const source = output[lane];
    for (let i = 0; i < size; i++) {
      target[i] = source[i];
    }
  }

};

/**
 * LSD radix sort, in place. non-negative values only: negative digits
 * would index outside the histogram, and this does not check. validate
 * first (ValidateNonNegative, or go through RunSort). stable.
 */
export const RadixSort = (seq: Sequence, options: StableSortOptions = {}): void => {

  const lanes = Lanes(seq, options.tags);

  if (seq.length <= 1) {
    return;
  }

  const max = FindMax(seq);

  for (let exp = 1; Math.floor(max / exp) > 0; exp *= RADIX) {
    CountingSortByDigit(lanes, exp);
  }

};
