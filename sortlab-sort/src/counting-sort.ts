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

/**
 * counting sort, in place. O(n + k) time and O(k) extra space where k
 * is the largest value, so a single large value is expensive (and can
 * fail with AllocationFailure). non-negative values only, unchecked
 * here. stable.
 */
export const CountingSort = (seq: Sequence, options: StableSortOptions = {}): void => {

  const lanes = Lanes(seq, options.tags);
  const size = seq.length;

  if (size <= 1) {
    return;
  }

  const max = FindMax(seq);
  const count = AllocateCounts(max + 1);

  for (let i = 0; i < size; i++) {
    count[seq[i]]++;
  }

  for (let value = 1; value <= max; value++) {
    count[value] += count[value - 1];
  }

  // last to first, for stability

  const output = lanes.map(() => AllocateBuffer(size));

  for (let i = size - 1; i >= 0; i--) {
    const position = --count[seq[i]];
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
