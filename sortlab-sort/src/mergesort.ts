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

import type { Sequence, SortCounters } from 'sortlab-base-types';
import type { SortOptions, StableSortOptions } from './sort-options';
import { Lanes } from './lanes';

/**
 * merge sorted runs [left, mid] and [mid + 1, right] back into place.
 *
 * lane 0 holds the keys; any further lanes (tags) follow the same
 * moves. each run is copied to a temporary first. ties take the left
 * head, which is what makes the sort stable.
 */
export const Merge = (lanes: number[][], left: number, mid: number, right: number, counters?: SortCounters): void => {

  const left_runs = lanes.map(lane => lane.slice(left, mid + 1));
  const right_runs = lanes.map(lane => lane.slice(mid + 1, right + 1));

  const left_keys = left_runs[0];
  const right_keys = right_runs[0];

  let i = 0;
  let j = 0;
  let k = left;

  const Emit = (runs: number[][], index: number) => {
    for (let lane = 0; lane < lanes.length; lane++) {
      lanes[lane][k] = runs[lane][index];
    }
    k++;
  };

  while (i < left_keys.length && j < right_keys.length) {
    if (counters) { counters.comparisons++; }
    if (left_keys[i] <= right_keys[j]) {
      Emit(left_runs, i++);
    }
    else {
      Emit(right_runs, j++);
    }
  }

  // one side is exhausted, flush the other

  while (i < left_keys.length) {
    Emit(left_runs, i++);
  }

  while (j < right_keys.length) {
    Emit(right_runs, j++);
  }

};

export const MergesortRange = (lanes: number[][], left: number, right: number, counters?: SortCounters): void => {
  if (left < right) {
    const mid = left + Math.floor((right - left) / 2);
    MergesortRange(lanes, left, mid, counters);
    MergesortRange(lanes, mid + 1, right, counters);
    Merge(lanes, left, mid, right, counters);
  }
};

/**
 * bottom-up: merge adjacent runs of width 1, 2, 4, ... no recursion.
 * split points differ from the top-down version but a stable sort has
 * exactly one possible output, so results are identical.
 */
export const MergesortBottomUp = (lanes: number[][], size: number, counters?: SortCounters): void => {
  for (let width = 1; width < size; width *= 2) {
    for (let left = 0; left < size - width; left += 2 * width) {
      const mid = left + width - 1;
      const right = Math.min(left + 2 * width - 1, size - 1);
      Merge(lanes, left, mid, right, counters);
    }
  }
};

/**
 * top-down mergesort. sorts in place but allocates O(n) temporaries
 * per merge (released when the merge returns). stable.
 */
export const Mergesort = (seq: Sequence, options: SortOptions & StableSortOptions = {}): void => {

  const lanes = Lanes(seq, options.tags);

  if (seq.length > 1) {
    if (options.strategy === 'iterative') {
      MergesortBottomUp(lanes, seq.length, options.counters);
    }
    else {
      MergesortRange(lanes, 0, seq.length - 1, options.counters);
    }
  }

};
