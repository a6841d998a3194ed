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

/** largest n whose value fits in an unsigned 64-bit integer */
export const MAX_FIBONACCI_N = 93;

/**
 * memo table for FibonacciMemoized. there is no module-level cache:
 * callers create one, pass it in, and drop it when they are done.
 */
export type FibonacciCache = Map<number, bigint>;

export const CreateFibonacciCache = (): FibonacciCache => {
  return new Map<number, bigint>([[0, 0n], [1, 1n]]);
};

/** naive double recursion, exponential time */
export const FibonacciRecursive = (n: number): bigint => {
  if (n <= 1) {
    return BigInt(n);
  }
  return FibonacciRecursive(n - 1) + FibonacciRecursive(n - 2);
};

export const FibonacciIterative = (n: number): bigint => {

  if (n <= 1) {
    return BigInt(n);
  }

  let prev = 0n;
  let curr = 1n;

  for (let i = 2; i <= n; i++) {
    const next = prev + curr;
    prev = curr;
    curr = next;
  }

  return curr;

};

/**
 * top-down recursion over the cache. entries written by one call are
 * reused by the next call given the same cache.
 */
export const FibonacciMemoized = (n: number, cache: FibonacciCache = CreateFibonacciCache()): bigint => {

  const cached = cache.get(n);
  if (cached !== undefined) {
    return cached;
  }

  const value = n <= 1 ? BigInt(n) : FibonacciMemoized(n - 1, cache) + FibonacciMemoized(n - 2, cache);
  cache.set(n, value);

  return value;

};

/** 2x2 matrix, row major */
type Matrix = [bigint, bigint, bigint, bigint];

const Multiply = (a: Matrix, b: Matrix): Matrix => {
  return [
    a[0] * b[0] + a[1] * b[2], a[0] * b[1] + a[1] * b[3],
    a[2] * b[0] + a[3] * b[2], a[2] * b[1] + a[3] * b[3],
  ];
};

/** m^n for n >= 1 by repeated squaring */
const Power = (m: Matrix, n: number): Matrix => {
  if (n === 1) {
    return m;
  }
  if (n % 2 === 0) {
    const half = Power(m, n / 2);
    return Multiply(half, half);
  }
  return Multiply(m, Power(m, n - 1));
};

/**
 * [[1, 1], [1, 0]]^n is [[F(n+1), F(n)], [F(n), F(n-1)]], so O(log n)
 * multiplications.
 */
export const FibonacciMatrix = (n: number): bigint => {
  if (n === 0) {
    return 0n;
  }
  return Power([1n, 1n, 1n, 0n], n)[1];
};

/** accumulator recursion. depth is n, which MAX_FIBONACCI_N keeps small */
export const FibonacciTailRecursive = (n: number, prev = 0n, curr = 1n): bigint => {
  if (n === 0) {
    return prev;
  }
  return FibonacciTailRecursive(n - 1, curr, prev + curr);
};

/** two running values, no temporary */
export const FibonacciOptimized = (n: number): bigint => {

  if (n <= 1) {
    return BigInt(n);
  }

  let a = 0n;
  let b = 1n;

  for (let i = 2; i <= n; i++) {
    b = a + b;
    a = b - a;
  }

  return b;

};
