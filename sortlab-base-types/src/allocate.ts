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

import { AllocationFailure } from './errors';
import type { Sequence } from './sequence';

/**
 * output buffer for the allocating sorts, zero filled. the engine
 * reports a bad or oversized length as a RangeError; we turn that into
 * an AllocationFailure so the sort fails as a whole.
 */
export const AllocateBuffer = (size: number): Sequence => {
  try {
    return new Array<number>(size).fill(0);
  }
  catch (err) {
    if (err instanceof RangeError) {
      throw new AllocationFailure(size);
    }
    throw err;
  }
};

/** zero-initialized count array (histograms, cumulative counts) */
export const AllocateCounts = (size: number): Uint32Array => {
  try {
    return new Uint32Array(size);
  }
  catch (err) {
    if (err instanceof RangeError) {
      throw new AllocationFailure(size);
    }
    throw err;
  }
};
