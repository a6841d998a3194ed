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

import type { SortCounters, Strategy } from 'sortlab-base-types';

/** options shared by the comparison sorts */
export interface SortOptions {

  /** incremented per comparison and per swap */
  counters?: SortCounters;

  /**
   * recursion strategy, for the sorts that recurse over index ranges
   * (quicksort, three-way quicksort, mergesort, heapsort). defaults to
   * recursive.
   */
  strategy?: Strategy;

}

/** options for the stable sorts */
export interface StableSortOptions {

  /**
   * payload permuted together with the keys. fill it with original
   * indices to observe stability. must be the same length as the
   * sequence.
   */
  tags?: number[];

}
