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

import { AllocateBuffer, Swap, type Sequence, type SortCounters } from 'sortlab-base-types';
import type { SortOptions } from './sort-options';

type Range = [low: number, high: number];

/**
 * Lomuto partition over [low, high], pivot is the last element. on
 * return everything left of the pivot's index is <= pivot and
 * everything right of it is > pivot.
 *
 * @returns final index of the pivot
 */
export const Partition = (seq: Sequence, low: number, high: number, counters?: SortCounters): number => {

  const pivot = seq[high];
  let i = low;

  for (let j = low; j < high; j++) {
    if (counters) { counters.comparisons++; }
    if (seq[j] <= pivot) {
      Swap(seq, i, j, counters);
      i++;
    }
  }

  Swap(seq, i, high, counters);
  return i;

};

/**
 * recurses into the smaller side and loops on the larger one, so depth
 * stays at O(log n) even when every partition is lopsided (sorted
 * input). partitions and results are the same as plain recursion.
 */
export const QuicksortRange = (seq: Sequence, low: number, high: number, counters?: SortCounters): void => {
  while (low < high) {
    const pivot_index = Partition(seq, low, high, counters);
    if (pivot_index - low < high - pivot_index) {
      QuicksortRange(seq, low, pivot_index - 1, counters);
      low = pivot_index + 1;
    }
    else {
      QuicksortRange(seq, pivot_index + 1, high, counters);
      high = pivot_index - 1;
    }
  }
};

/**
 * same partitioning, driven by a work stack. the larger side is pushed
 * first so the smaller one is always handled next, which keeps the
 * stack at O(log n) ranges.
 */
export const QuicksortRangeIterative = (seq: Sequence, low: number, high: number, counters?: SortCounters): void => {

  const stack: Range[] = [[low, high]];

  for (let range = stack.pop(); range; range = stack.pop()) {

    const [start, end] = range;
    if (start >= end) {
      continue;
    }

    const pivot_index = Partition(seq, start, end, counters);
    const left: Range = [start, pivot_index - 1];
    const right: Range = [pivot_index + 1, end];

    if (left[1] - left[0] > right[1] - right[0]) {
      stack.push(left, right);
    }
    else {
      stack.push(right, left);
    }

  }

};

/**
 * in-place quicksort (Lomuto). not stable, no allocation in the
 * recursive strategy. worst case O(n^2) on sorted input, since the
 * pivot is always the last element.
 */
export const QuicksortInPlace = (seq: Sequence, options: SortOptions = {}): void => {
  if (seq.length > 1) {
    if (options.strategy === 'iterative') {
      QuicksortRangeIterative(seq, 0, seq.length - 1, options.counters);
    }
    else {
      QuicksortRange(seq, 0, seq.length - 1, options.counters);
    }
  }
};

/** -1, 0, 1 for less, equal, greater. counts each test it makes. */
const Classify = (value: number, pivot: number, counters?: SortCounters): number => {
  if (counters) { counters.comparisons++; }
  if (value < pivot) {
    return -1;
  }
  if (counters) { counters.comparisons++; }
  return value === pivot ? 0 : 1;
};

/**
 * value-partitioning quicksort. never touches its input; every level
 * allocates exactly-sized less/equal/greater buffers (count first, then
 * fill) and the result is less ++ equal ++ greater. order among equal
 * elements is not specified.
 *
 * strategy does not apply here: the recursion is over new buffers, not
 * index ranges.
 */
export const QuicksortFunctional = (seq: readonly number[], options: Pick<SortOptions, 'counters'> = {}): Sequence => {

  const size = seq.length;
  const counters = options.counters;

  if (size <= 1) {
    return seq.slice(0);
  }

  const pivot = seq[Math.floor(size / 2)];

  let less_count = 0;
  let equal_count = 0;
  let greater_count = 0;

  for (const value of seq) {
    const side = Classify(value, pivot, counters);
    if (side < 0) { less_count++; }
    else if (side === 0) { equal_count++; }
    else { greater_count++; }
  }

  const less = AllocateBuffer(less_count);
  const equal = AllocateBuffer(equal_count);
  const greater = AllocateBuffer(greater_count);

  let less_index = 0;
  let equal_index = 0;
  let greater_index = 0;

  for (const value of seq) {
    const side = Classify(value, pivot, counters);
    if (side < 0) { less[less_index++] = value; }
    else if (side === 0) { equal[equal_index++] = value; }
    else { greater[greater_index++] = value; }
  }

  const sorted_less = QuicksortFunctional(less, options);
  const sorted_greater = QuicksortFunctional(greater, options);

  const result = AllocateBuffer(size);
  let index = 0;

  for (const value of sorted_less) { result[index++] = value; }
  for (const value of equal) { result[index++] = value; }
  for (const value of sorted_greater) { result[index++] = value; }

  return result;

};

/**
 * Dutch-flag partition over [low, high], pivot is the first element.
 * on return [low, lt) < pivot, [lt, gt] == pivot, (gt, high] > pivot.
 *
 * after a swap with gt the cursor stays put, the value swapped in has
 * not been examined yet. every iteration either advances i or lowers
 * gt, so the loop terminates.
 */
export const ThreeWayPartition = (seq: Sequence, low: number, high: number, counters?: SortCounters): Range => {

  const pivot = seq[low];
  let lt = low;
  let gt = high;
  let i = low + 1;

  while (i <= gt) {
    if (counters) { counters.comparisons++; }
    if (seq[i] < pivot) {
      Swap(seq, i, lt, counters);
      lt++;
      i++;
      continue;
    }
    if (counters) { counters.comparisons++; }
    if (seq[i] > pivot) {
      Swap(seq, i, gt, counters);
      gt--;
    }
    else {
      i++;
    }
  }

  return [lt, gt];

};

/** smaller side first by recursion, larger side by looping, as QuicksortRange */
export const ThreeWayPartitionSort = (seq: Sequence, low: number, high: number, counters?: SortCounters): void => {
  while (low < high) {
    const [lt, gt] = ThreeWayPartition(seq, low, high, counters);
    if (lt - low < high - gt) {
      ThreeWayPartitionSort(seq, low, lt - 1, counters);
      low = gt + 1;
    }
    else {
      ThreeWayPartitionSort(seq, gt + 1, high, counters);
      high = lt - 1;
    }
  }
};

export const ThreeWayPartitionSortIterative = (seq: Sequence, low: number, high: number, counters?: SortCounters): void => {

  const stack: Range[] = [[low, high]];

  for (let range = stack.pop(); range; range = stack.pop()) {

    const [start, end] = range;
    if (start >= end) {
      continue;
    }

    const [lt, gt] = ThreeWayPartition(seq, start, end, counters);
    const left: Range = [start, lt - 1];
    const right: Range = [gt + 1, end];

    if (left[1] - left[0] > right[1] - right[0]) {
      stack.push(left, right);
    }
    else {
      stack.push(right, left);
    }

  }

};

/**
 * three-way quicksort. runs of values equal to the pivot are placed
 * in one pass and never split again, so all-equal input costs O(n)
 * comparisons.
 */
export const QuicksortThreeWay = (seq: Sequence, options: SortOptions = {}): void => {
  if (seq.length <= 1) {
    return;
  }
  if (options.strategy === 'iterative') {
    ThreeWayPartitionSortIterative(seq, 0, seq.length - 1, options.counters);
  }
  else {
    ThreeWayPartitionSort(seq, 0, seq.length - 1, options.counters);
  }
};
