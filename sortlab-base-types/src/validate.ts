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

import { NegativeValuePrecondition, UnsortedInput } from './errors';

/**
 * throws on the first negative value. run this before radix or
 * counting sort; they index count arrays by value and do not check.
 */
export const ValidateNonNegative = (seq: readonly number[], algorithm?: string): void => {
  for (let i = 0; i < seq.length; i++) {
    if (seq[i] < 0) {
      throw new NegativeValuePrecondition(i, seq[i], algorithm);
    }
  }
};

/** binary search input check. throws at the first descent. */
export const ValidateSorted = (seq: readonly number[]): void => {
  for (let i = 0; i < seq.length - 1; i++) {
    if (seq[i] > seq[i + 1]) {
      throw new UnsortedInput(i + 1);
    }
  }
};
