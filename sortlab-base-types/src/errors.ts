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

export enum SortErrorType {
  Allocation =        'ALLOC',
  NegativeValue =     'NEGATIVE',
  Parse =             'PARSE',
  UnknownAlgorithm =  'ALGORITHM',
  Unsorted =          'UNSORTED',
  Config =            'CONFIG',
  Usage =             'USAGE',
  Range =             'RANGE',
}

/**
 * base class for everything the suite throws on purpose. the CLI
 * reports these as user errors; anything else is a bug and propagates.
 */
export class SortError extends Error {

  constructor(public readonly type: SortErrorType, message: string) {
    super(message);
    this.name = 'SortError';
  }

}

/** buffer creation failed (size too large, or invalid) */
export class AllocationFailure extends SortError {

  constructor(public readonly size: number) {
    super(SortErrorType.Allocation, `Memory allocation failed (${size} elements)`);
    this.name = 'AllocationFailure';
  }

}

/**
 * radix and counting sort only take non-negative values. this is
 * raised before either runs, never from inside.
 */
export class NegativeValuePrecondition extends SortError {

  constructor(public readonly index: number, public readonly value: number, algorithm = 'This algorithm') {
    super(SortErrorType.NegativeValue,
      `${algorithm} only works with non-negative integers (found ${value} at index ${index})`);
    this.name = 'NegativeValuePrecondition';
  }

}

export class ParseError extends SortError {

  constructor(public readonly text: string, public readonly position: number) {
    super(SortErrorType.Parse, `Invalid integer "${text}" at argument ${position + 1}`);
    this.name = 'ParseError';
  }

}

export class UnknownAlgorithm extends SortError {

  constructor(public readonly algorithm: string) {
    super(SortErrorType.UnknownAlgorithm, `Unknown algorithm "${algorithm}"`);
    this.name = 'UnknownAlgorithm';
  }

}

export class UnknownVariant extends SortError {

  constructor(public readonly variant: string) {
    super(SortErrorType.UnknownAlgorithm, `Unknown variant "${variant}"`);
    this.name = 'UnknownVariant';
  }

}

/** argument outside the range an algorithm supports, e.g. fibonacci n */
export class OutOfRange extends SortError {

  constructor(public readonly value: number, public readonly min: number, public readonly max: number, what = 'n') {
    super(SortErrorType.Range, `${what} must be between ${min} and ${max} (got ${value})`);
    this.name = 'OutOfRange';
  }

}

export class UnsortedInput extends SortError {

  constructor(public readonly index: number) {
    super(SortErrorType.Unsorted, `Input must be sorted (out of order at index ${index})`);
    this.name = 'UnsortedInput';
  }

}

export class ConfigError extends SortError {

  constructor(public readonly file: string, reason: string) {
    super(SortErrorType.Config, `Invalid config file ${file}: ${reason}`);
    this.name = 'ConfigError';
  }

}

/** bad command line: unknown flag value, missing arguments */
export class UsageError extends SortError {

  constructor(message: string) {
    super(SortErrorType.Usage, message);
    this.name = 'UsageError';
  }

}

export const IsSortError = (err: unknown): err is SortError => {
  return err instanceof SortError;
};
