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

import { Swap, type Sequence, type SortCounters } from 'sortlab-base-types';
import type { SortOptions } from './sort-options';

/** index of the largest of node i and its children within heap_size */
const Largest = (seq: Sequence, heap_size: number, i: number, counters?: SortCounters): number => {

  let largest = i;
  const left = 2 * i + 1;
  const right = 2 * i + 2;

  if (left < heap_size) {
    if (counters) { counters.comparisons++; }
    if (seq[left] > seq[largest]) {
      largest = left;
    }
  }

  if (right < heap_size) {
    if (counters) { counters.comparisons++; }
    if (seq[right] > seq[largest]) {
      largest = right;
    }
  }

  return largest;

};

/**
 * sift-down. restores the max-heap property for the subtree at i,
 * swapping along the larger child until nothing moves or we hit a leaf.
 */
export const Heapify = (seq: Sequence, heap_size: number, i: number, counters?: SortCounters): void => {
  const largest = Largest(seq, heap_size, i, counters);
  if (largest !== i) {
    Swap(seq, i, largest, counters);
    Heapify(seq, heap_size, largest, counters);
  }
};

/** sift-down as a loop */
export const HeapifyIterative = (seq: Sequence, heap_size: number, i: number, counters?: SortCounters): void => {
  for (;;) {
    const largest = Largest(seq, heap_size, i, counters);
    if (largest === i) {
      return;
    }
    Swap(seq, i, largest, counters);
    i = largest;
  }
};

type SiftDown = typeof Heapify;

/** heapify every non-leaf, last one first */
export const BuildMaxHeap = (seq: Sequence, size: number, counters?: SortCounters, sift: SiftDown = Heapify): void => {
  const last_non_leaf = Math.floor(size / 2) - 1;
  for (let i = last_non_leaf; i >= 0; i--) {
    sift(seq, size, i, counters);
  }
};

/**
 * heapsort. in place, O(1) auxiliary space, not stable.
 */
export const Heapsort = (seq: Sequence, options: SortOptions = {}): void => {

  const size = seq.length;
  if (size <= 1) {
    return;
  }

  const sift = options.strategy === 'iterative' ? HeapifyIterative : Heapify;
  const counters = options.counters;

  BuildMaxHeap(seq, size, counters, sift);

  // move the root (current max) behind the heap, shrink, re-sift

  for (let i = size - 1; i > 0; i--) {
    Swap(seq, 0, i, counters);
    sift(seq, i, 0, counters);
  }

};
