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

import { FormatSequence, IsSortError, IsSorted, type Sequence } from 'sortlab-base-types';
import { RunSort, type AlgorithmDescriptor, type SortOptions } from 'sortlab-sort';
import { BinarySearch, BinarySearchRecursive } from 'sortlab-search';
import { CreateFibonacciCache, Fibonacci, type FibonacciVariant } from 'sortlab-fibonacci';
import type { FibonacciFixture, SearchFixture, SortFixture } from './fixtures';

export interface TestSummary {
  passed: number;
  total: number;
}

type Logger = (message: string) => void;

export const FixtureApplies = (descriptor: AlgorithmDescriptor, fixture: SortFixture): boolean => {
  switch (fixture.scope) {
    case 'signed': return !descriptor.non_negative;
    case 'non-negative': return descriptor.non_negative;
    default: return true;
  }
};

const SameSequence = (a: readonly number[], b: readonly number[]) => {
  return a.length === b.length && a.every((value, index) => value === b[index]);
};

/**
 * run one fixture. returns undefined on success, otherwise a
 * description of the failure.
 */
export const CheckSortFixture = (descriptor: AlgorithmDescriptor, fixture: SortFixture, options: SortOptions = {}): string|undefined => {

  const input: Sequence = fixture.input.slice(0);
  let output: Sequence;

  try {
    output = RunSort(descriptor, input, options);
  }
  catch (err) {
    if (!IsSortError(err)) {
      throw err;
    }
    if (fixture.error === err.type) {
      return SameSequence(input, fixture.input) ? undefined : 'input was modified before rejection';
    }
    return `unexpected error: ${err.message}`;
  }

  if (fixture.error) {
    return `expected ${fixture.error} error, got ${FormatSequence(output)}`;
  }

  if (!IsSorted(output)) {
    return `not sorted: ${FormatSequence(output)}`;
  }

  if (fixture.expected && !SameSequence(output, fixture.expected)) {
    return `expected ${FormatSequence(fixture.expected)}, got ${FormatSequence(output)}`;
  }

  if (!descriptor.in_place && !SameSequence(input, fixture.input)) {
    return 'input was modified';
  }

  return undefined;

};

export const RunSortSelfTest = (descriptor: AlgorithmDescriptor, fixtures: SortFixture[], log: Logger, options: SortOptions = {}): TestSummary => {

  const summary: TestSummary = { passed: 0, total: 0 };

  log(`Running ${descriptor.label} tests...`);

  for (const fixture of fixtures) {
    if (!FixtureApplies(descriptor, fixture)) {
      continue;
    }
    summary.total++;
    const failure = CheckSortFixture(descriptor, fixture, options);
    if (failure) {
      log(`✗ ${fixture.name}: ${failure}`);
    }
    else {
      log(`✓ ${fixture.name}`);
      summary.passed++;
    }
  }

  log(`Tests completed: ${summary.passed}/${summary.total} passed`);
  return summary;

};

/** both search forms must agree with the fixture */
export const RunSearchSelfTest = (fixtures: SearchFixture[], log: Logger): TestSummary => {

  const summary: TestSummary = { passed: 0, total: 0 };

  log('Running Binary Search tests...');

  for (const fixture of fixtures) {
    summary.total++;
    const iterative = BinarySearch(fixture.input, fixture.target);
    const recursive = BinarySearchRecursive(fixture.input, fixture.target);
    if (iterative === fixture.expected && recursive === fixture.expected) {
      log(`✓ ${fixture.name}`);
      summary.passed++;
    }
    else {
      log(`✗ ${fixture.name}: expected ${fixture.expected}, got ${iterative} (iterative), ${recursive} (recursive)`);
    }
  }

  log(`Tests completed: ${summary.passed}/${summary.total} passed`);
  return summary;

};

/** exponential variants skip fixtures above this n */
export const EXPONENTIAL_TEST_LIMIT = 30;

/**
 * every fixture through every variant. each variant gets its own memo
 * cache, shared across that variant's fixtures.
 */
export const RunFibonacciSelfTest = (variants: FibonacciVariant[], fixtures: FibonacciFixture[], log: Logger): TestSummary => {

  const summary: TestSummary = { passed: 0, total: 0 };

  for (const variant of variants) {

    log(`Running Fibonacci (${variant.label}) tests...`);
    const cache = CreateFibonacciCache();

    for (const fixture of fixtures) {
      if (variant.exponential && fixture.n > EXPONENTIAL_TEST_LIMIT) {
        continue;
      }
      summary.total++;
      const value = Fibonacci(variant, fixture.n, { cache });
      if (value === fixture.expected) {
        log(`✓ ${fixture.name}`);
        summary.passed++;
      }
      else {
        log(`✗ ${fixture.name}: expected ${fixture.expected}, got ${value}`);
      }
    }

  }

  log(`Tests completed: ${summary.passed}/${summary.total} passed`);
  return summary;

};
