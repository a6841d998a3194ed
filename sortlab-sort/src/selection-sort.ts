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

import { Swap, type Sequence } from 'sortlab-base-types';
import type { SortOptions } from './sort-options';

/**
 * selection sort. O(n^2) comparisons, at most n - 1 swaps. not stable.
 */
export const SelectionSort = (seq: Sequence, options: Pick<SortOptions, 'counters'> = {}): void => {

  const counters = options.counters;

  for (let i = 0; i < seq.length - 1; i++) {

    let min_index = i;

    for (let j = i + 1; j < seq.length; j++) {
      if (counters) { counters.comparisons++; }
      if (seq[j] < seq[min_index]) {
        min_index = j;
      }
    }

    if (min_index !== i) {
      Swap(seq, i, min_index, counters);
    }

  }

};
