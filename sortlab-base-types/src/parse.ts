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

import { ParseError } from './errors';
import { IsInt32, type Sequence } from './sequence';

const integer_pattern = /^[+-]?\d+$/;

/**
 * strict integer parse. unlike parseInt this rejects trailing garbage,
 * decimals, exponents and anything outside the int32 range.
 *
 * @param position argument position, used in the error message
 */
export const ParseInteger = (text: string, position = 0): number => {

  const trimmed = text.trim();
  if (!integer_pattern.test(trimmed)) {
    throw new ParseError(text, position);
  }

  const value = Number(trimmed);
  if (!IsInt32(value)) {
    throw new ParseError(text, position);
  }

  // normalize -0
  return value === 0 ? 0 : value;

};

/**
 * parse a list of arguments. fails on the first bad one, before
 * anything is sorted.
 *
 * @param offset added to positions in error messages, for callers that
 * have already consumed leading arguments
 */
export const ParseSequence = (texts: readonly string[], offset = 0): Sequence => {
  return texts.map((text, index) => ParseInteger(text, index + offset));
};
