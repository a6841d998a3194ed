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

import { OutOfRange, UnknownVariant } from 'sortlab-base-types';
import {
  CreateFibonacciCache, FibonacciIterative, FibonacciMatrix, FibonacciMemoized,
  FibonacciOptimized, FibonacciRecursive, FibonacciTailRecursive, MAX_FIBONACCI_N,
  type FibonacciCache,
} from './fibonacci';

export interface FibonacciOptions {

  /** memo table for the memoized variant; a fresh one per call if unset */
  cache?: FibonacciCache;

}

export interface FibonacciVariant {

  /** command-line name */
  name: string;

  /** display name */
  label: string;

  /** exponential time. callers keep n small */
  exponential: boolean;

  Compute: (n: number, options: FibonacciOptions) => bigint;

}

export const DEFAULT_FIBONACCI_VARIANT = 'iterative';

export const FibonacciVariants: FibonacciVariant[] = [
  {
    name: 'recursive',
    label: 'Recursive',
    exponential: true,
    Compute: n => FibonacciRecursive(n),
  },
  {
    name: 'iterative',
    label: 'Iterative',
    exponential: false,
    Compute: n => FibonacciIterative(n),
  },
  {
    name: 'memoized',
    label: 'Memoized',
    exponential: false,
    Compute: (n, options) => FibonacciMemoized(n, options.cache || CreateFibonacciCache()),
  },
  {
    name: 'matrix',
    label: 'Matrix',
    exponential: false,
    Compute: n => FibonacciMatrix(n),
  },
  {
    name: 'tail',
    label: 'Tail-recursive',
    exponential: false,
    Compute: n => FibonacciTailRecursive(n),
  },
  {
    name: 'optimized',
    label: 'Optimized',
    exponential: false,
    Compute: n => FibonacciOptimized(n),
  },
];

/** case-insensitive */
export const FindVariant = (name: string): FibonacciVariant => {
  const lc = name.toLowerCase();
  const variant = FibonacciVariants.find(test => test.name === lc);
  if (!variant) {
    throw new UnknownVariant(name);
  }
  return variant;
};

export const ValidateFibonacciIndex = (n: number): void => {
  if (!Number.isInteger(n) || n < 0 || n > MAX_FIBONACCI_N) {
    throw new OutOfRange(n, 0, MAX_FIBONACCI_N);
  }
};

/** checks n, then computes F(n) with the given variant */
export const Fibonacci = (variant: string|FibonacciVariant, n: number, options: FibonacciOptions = {}): bigint => {
  const descriptor = typeof variant === 'string' ? FindVariant(variant) : variant;
  ValidateFibonacciIndex(n);
  return descriptor.Compute(n, options);
};
