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

/** returned when the target is not present */
export const NOT_FOUND = -1;

/**
 * iterative binary search over a non-decreasing sequence. input is
 * assumed sorted (ValidateSorted checks). with duplicates, returns
 * whichever equal element the probes reach first.
 *
 * @returns index of target, or NOT_FOUND
 */
export const BinarySearch = (seq: readonly number[], target: number): number => {

  let left = 0;
  let right = seq.length - 1;

  while (left <= right) {
    const mid = left + Math.floor((right - left) / 2);
    if (seq[mid] === target) {
      return mid;
    }
    if (seq[mid] < target) {
      left = mid + 1;
    }
    else {
      right = mid - 1;
    }
  }

  return NOT_FOUND;

};

const SearchRange = (seq: readonly number[], left: number, right: number, target: number): number => {

  if (left > right) {
    return NOT_FOUND;
  }

  const mid = left + Math.floor((right - left) / 2);

  if (seq[mid] === target) {
    return mid;
  }
  if (seq[mid] < target) {
    return SearchRange(seq, mid + 1, right, target);
  }
  return SearchRange(seq, left, mid - 1, target);

};

/** recursive form, same probe sequence as BinarySearch */
export const BinarySearchRecursive = (seq: readonly number[], target: number): number => {
  return SearchRange(seq, 0, seq.length - 1, target);
};
