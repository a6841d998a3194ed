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

import type { Sequence } from 'sortlab-base-types';

/**
 * keys plus optional tags, as a list of parallel arrays. the stable
 * sorts move every lane together.
 */
export const Lanes = (seq: Sequence, tags?: number[]): number[][] => {
  if (!tags) {
    return [seq];
  }
  if (tags.length !== seq.length) {
    throw new RangeError(`tags length (${tags.length}) does not match sequence length (${seq.length})`);
  }
  return [seq, tags];
};
