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

import { UnknownAlgorithm, ValidateNonNegative, type Sequence } from 'sortlab-base-types';
import type { SortOptions } from './sort-options';
import { QuicksortFunctional, QuicksortInPlace, QuicksortThreeWay } from './quicksort';
import { Mergesort } from './mergesort';
import { Heapsort } from './heapsort';
import { RadixSort } from './radix-sort';
import { CountingSort } from './counting-sort';
import { SelectionSort } from './selection-sort';

export interface AlgorithmDescriptor {

  /** registry name, as typed on the command line */
  name: string;

  /** display name */
  label: string;

  stable: boolean;

  /** false if the sort returns a new sequence and leaves its input alone */
  in_place: boolean;

  /** radix and counting sort. input is validated before they run */
  non_negative: boolean;

  /** compares elements, so counters.comparisons is meaningful */
  comparison: boolean;

  /** recurses over index ranges, so the strategy option applies */
  recursive: boolean;

  /**
   * run the sort. returns the sorted sequence: the argument itself for
   * in-place sorts, a new array otherwise.
   */
  Sort: (seq: Sequence, options: SortOptions) => Sequence;

}

export const Algorithms: AlgorithmDescriptor[] = [
  {
    name: 'quicksort',
    label: 'Quicksort (in-place)',
    stable: false, in_place: true, non_negative: false, comparison: true, recursive: true,
    Sort: (seq, options) => {
      QuicksortInPlace(seq, options);
      return seq;
    },
  },
  {
    name: 'quicksort-functional',
    label: 'Quicksort (functional)',
    stable: false, in_place: false, non_negative: false, comparison: true, recursive: false,
    Sort: (seq, options) => QuicksortFunctional(seq, { counters: options.counters }),
  },
  {
    name: 'quicksort-three-way',
    label: 'Quicksort (three-way)',
    stable: false, in_place: true, non_negative: false, comparison: true, recursive: true,
    Sort: (seq, options) => {
      QuicksortThreeWay(seq, options);
      return seq;
    },
  },
  {
    name: 'mergesort',
    label: 'Merge sort',
    stable: true, in_place: true, non_negative: false, comparison: true, recursive: true,
    Sort: (seq, options) => {
      Mergesort(seq, options);
      return seq;
    },
  },
  {
    name: 'heapsort',
    label: 'Heap sort',
    stable: false, in_place: true, non_negative: false, comparison: true, recursive: true,
    Sort: (seq, options) => {
      Heapsort(seq, options);
      return seq;
    },
  },
  {
    name: 'radix-sort',
    label: 'Radix sort',
    stable: true, in_place: true, non_negative: true, comparison: false, recursive: false,
    Sort: (seq) => {
      RadixSort(seq);
      return seq;
    },
  },
  {
    name: 'counting-sort',
    label: 'Counting sort',
    stable: true, in_place: true, non_negative: true, comparison: false, recursive: false,
    Sort: (seq) => {
      CountingSort(seq);
      return seq;
    },
  },
  {
    name: 'selection-sort',
    label: 'Selection sort',
    stable: false, in_place: true, non_negative: false, comparison: true, recursive: false,
    Sort: (seq, options) => {
      SelectionSort(seq, { counters: options.counters });
      return seq;
    },
  },
];

/** case-insensitive lookup. throws UnknownAlgorithm */
export const FindAlgorithm = (name: string): AlgorithmDescriptor => {
  const lc = name.toLowerCase();
  const descriptor = Algorithms.find(test => test.name === lc);
  if (!descriptor) {
    throw new UnknownAlgorithm(name);
  }
  return descriptor;
};

/**
 * checked entry point. for the non-negative sorts the whole input is
 * validated before the sort starts, so a rejected sequence is returned
 * to the caller untouched.
 */
export const RunSort = (algorithm: string|AlgorithmDescriptor, seq: Sequence, options: SortOptions = {}): Sequence => {

  const descriptor = typeof algorithm === 'string' ? FindAlgorithm(algorithm) : algorithm;

  if (descriptor.non_negative) {
    ValidateNonNegative(seq, descriptor.label);
  }

  return descriptor.Sort(seq, options);

};
