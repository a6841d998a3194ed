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

import { FormatSequence, ParseInteger, ParseSequence, ValidateSorted } from 'sortlab-base-types';
import { Algorithms, RunSort, type AlgorithmDescriptor } from 'sortlab-sort';
import { BinarySearch, NOT_FOUND } from 'sortlab-search';
import {
  DEFAULT_FIBONACCI_VARIANT, FibonacciVariants, FindVariant, ValidateFibonacciIndex,
  type FibonacciVariant,
} from 'sortlab-fibonacci';
import type { Config } from './config';
import { LoadFixtures } from './fixtures';
import { RunFibonacciSelfTest, RunSearchSelfTest, RunSortSelfTest } from './self-test';
import {
  Benchmark, FIBONACCI_BENCHMARK_N, FIBONACCI_LARGE_N, TimeFibonacci, type FibonacciTiming,
} from './benchmark';

/** above this n the exponential variant gets a warning */
const SLOW_FIBONACCI_N = 40;

/**
 * command implementations. every method returns the process exit code;
 * SortErrors thrown from here are reported by the caller.
 */
export class SortRunner {

  constructor(protected config: Config) {
  }

  public Log(message: string): void {
    if (this.config.verbose) {
      console.info(`${new Date().toLocaleString()}: ${message}`);
    }
    else {
      console.info(message);
    }
  }

  public Warn(message: string): void {
    console.warn(`Warning: ${message}`);
  }

  public Usage(descriptor?: AlgorithmDescriptor): number {

    const name = descriptor ? descriptor.name : '<algorithm>';

    this.Log(`Usage: sortlab ${name} <num1> <num2> <num3> ...`);
    this.Log(`       sortlab ${name} test`);
    this.Log(`       sortlab ${name} bench [--size <n>]`);

    if (!descriptor) {
      this.Log('       sortlab search <target> <num1> <num2> ...');
      this.Log('       sortlab search test');
      this.Log('       sortlab fibonacci <n> [variant] | test | bench');
      this.Log('       sortlab list');
      this.Log('');
      this.Log('Options: -c, --config <file>  --strategy recursive|iterative  --verbose');
    }
    else if (descriptor.non_negative) {
      this.Log('');
      this.Log('Note: Only works with non-negative integers');
    }

    return 1;

  }

  public List(): number {
    for (const descriptor of Algorithms) {
      const properties = [
        descriptor.in_place ? 'in-place' : 'allocating',
        descriptor.stable ? 'stable' : 'unstable',
      ];
      if (descriptor.non_negative) {
        properties.push('non-negative only');
      }
      this.Log(`${descriptor.name.padEnd(22)}${descriptor.label.padEnd(24)}${properties.join(', ')}`);
    }
    return 0;
  }

  /** parse, sort, print. nothing is printed if parsing or validation fails */
  public Sort(descriptor: AlgorithmDescriptor, args: string[]): number {

    if (!args.length) {
      return this.Usage(descriptor);
    }

    this.CheckStrategy(descriptor);

    const input = ParseSequence(args, 1);
    const output = RunSort(descriptor, input.slice(0), { strategy: this.config.strategy });

    this.Log(`Before: ${FormatSequence(input)}`);
    this.Log(`After:  ${FormatSequence(output)}`);

    return 0;

  }

  public async Test(descriptor: AlgorithmDescriptor): Promise<number> {
    this.CheckStrategy(descriptor);
    const fixtures = await LoadFixtures(this.config.fixtures);
    const summary = RunSortSelfTest(descriptor, fixtures.sort, message => this.Log(message), { strategy: this.config.strategy });
    return summary.passed === summary.total ? 0 : 1;
  }

  public Bench(descriptor: AlgorithmDescriptor, size = this.config.benchmark_size): number {

    this.CheckStrategy(descriptor);

    const result = Benchmark(descriptor, size, { strategy: this.config.strategy });

    this.Log('Performance demonstration with large array:');
    this.Log(`  Algorithm: ${descriptor.label}`);
    this.Log(`  Array size: ${result.size}`);
    this.Log(`  Time: ${result.elapsed.toFixed(4)}ms`);

    if (descriptor.comparison) {
      this.Log(`  Comparisons: ${result.counters.comparisons}`);
      this.Log(`  Swaps: ${result.counters.swaps}`);
    }

    this.Log(`  Sorted: ${result.sorted ? 'yes' : 'no'}`);

    return result.sorted ? 0 : 1;

  }

  /** `search <target> <values...>` */
  public Search(args: string[]): number {

    if (args.length < 2) {
      this.Log('Usage: sortlab search <target> <element1> <element2> ...');
      this.Log('       sortlab search test');
      return 1;
    }

    const target = ParseInteger(args[0], 1);
    const seq = ParseSequence(args.slice(1), 2);

    ValidateSorted(seq);

    const index = BinarySearch(seq, target);
    if (index === NOT_FOUND) {
      this.Log('Not found');
    }
    else {
      this.Log(`Found at index: ${index}`);
    }

    return 0;

  }

  public async SearchTest(): Promise<number> {
    const fixtures = await LoadFixtures(this.config.fixtures);
    const summary = RunSearchSelfTest(fixtures.search, message => this.Log(message));
    return summary.passed === summary.total ? 0 : 1;
  }

  /** `fibonacci <n> [variant]` */
  public Fibonacci(args: string[]): number {

    if (args.length < 1 || args.length > 2) {
      this.Log('Usage: sortlab fibonacci <n> [variant]');
      this.Log('       sortlab fibonacci test');
      this.Log('       sortlab fibonacci bench');
      this.Log(`Variants: ${FibonacciVariants.map(variant => variant.name).join(', ')}`);
      return 1;
    }

    const n = ParseInteger(args[0], 1);
    const variant = FindVariant(args.length > 1 ? args[1] : DEFAULT_FIBONACCI_VARIANT);

    ValidateFibonacciIndex(n);

    if (variant.exponential && n > SLOW_FIBONACCI_N) {
      this.Warn(`${variant.name} is very slow for n > ${SLOW_FIBONACCI_N}`);
    }

    this.Log(this.FormatTiming(variant, TimeFibonacci(variant, n)));
    return 0;

  }

  public async FibonacciTest(): Promise<number> {
    const fixtures = await LoadFixtures(this.config.fixtures);
    const summary = RunFibonacciSelfTest(FibonacciVariants, fixtures.fibonacci, message => this.Log(message));
    return summary.passed === summary.total ? 0 : 1;
  }

  /** every polynomial-time variant at one n, then one large value */
  public FibonacciBench(): number {

    this.Log(`Fibonacci benchmark, n = ${FIBONACCI_BENCHMARK_N}:`);

    for (const variant of FibonacciVariants) {
      if (!variant.exponential) {
        this.Log(`  ${this.FormatTiming(variant, TimeFibonacci(variant, FIBONACCI_BENCHMARK_N))}`);
      }
    }

    const variant = FindVariant(DEFAULT_FIBONACCI_VARIANT);

    this.Log('Large number test:');
    this.Log(`  ${this.FormatTiming(variant, TimeFibonacci(variant, FIBONACCI_LARGE_N))}`);

    return 0;

  }

  protected FormatTiming(variant: FibonacciVariant, timing: FibonacciTiming): string {
    return `${variant.label}: fib(${timing.n}) = ${timing.value} (${timing.elapsed.toFixed(4)}ms)`;
  }

  protected CheckStrategy(descriptor: AlgorithmDescriptor): void {
    if (this.config.strategy === 'iterative' && !descriptor.recursive) {
      this.Warn(`strategy has no effect on ${descriptor.label}`);
    }
  }

}
