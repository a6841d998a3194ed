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

import { performance } from 'perf_hooks';
import { AllocateBuffer, CreateCounters, IsSorted, type Sequence, type SortCounters } from 'sortlab-base-types';
import { RunSort, type AlgorithmDescriptor, type SortOptions } from 'sortlab-sort';
import { Fibonacci, type FibonacciOptions, type FibonacciVariant } from 'sortlab-fibonacci';

export interface BenchmarkResult {
  size: number;

  /** milliseconds */
  elapsed: number;

  counters: SortCounters;
  sorted: boolean;
}

/**
 * deterministic data: (i * 37 + 11) % 1000. values repeat every 1000
 * elements and are all non-negative, so every algorithm can take it.
 */
export const GenerateBenchmarkData = (size: number): Sequence => {
  const data = AllocateBuffer(size);
  for (let i = 0; i < size; i++) {
    data[i] = (i * 37 + 11) % 1000;
  }
  return data;
};

/** one timed run over a fresh copy of the generated data */
export const Benchmark = (descriptor: AlgorithmDescriptor, size: number, options: Pick<SortOptions, 'strategy'> = {}): BenchmarkResult => {

  const data = GenerateBenchmarkData(size);
  const counters = CreateCounters();

  const start = performance.now();
  const output = RunSort(descriptor, data, { ...options, counters });
  const elapsed = performance.now() - start;

  return {
    size,
    elapsed,
    counters,
    sorted: output.length === size && IsSorted(output),
  };

};

/** n for the variant comparison, and for the large-value run */
export const FIBONACCI_BENCHMARK_N = 40;
export const FIBONACCI_LARGE_N = 90;

export interface FibonacciTiming {
  n: number;
  value: bigint;

  /** milliseconds */
  elapsed: number;
}

export const TimeFibonacci = (variant: FibonacciVariant, n: number, options: FibonacciOptions = {}): FibonacciTiming => {

  const start = performance.now();
  const value = Fibonacci(variant, n, options);
  const elapsed = performance.now() - start;

  return { n, value, elapsed };

};
