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

import * as fs from 'fs';
import { ConfigError, IsInt32, SortErrorType } from 'sortlab-base-types';
import { IsRecord } from './config';
import bundled_fixtures from '../fixtures.json';

/**
 * which algorithms a fixture applies to. `signed` fixtures contain
 * negative values and are skipped for radix and counting sort;
 * `non-negative` fixtures only run against those two.
 */
export type FixtureScope = 'all' | 'signed' | 'non-negative';

export interface SortFixture {
  name: string;
  scope: FixtureScope;
  input: number[];

  /** sorted output, or... */
  expected?: number[];

  /** ...the error type the sort must be rejected with */
  error?: SortErrorType;
}

export interface SearchFixture {
  name: string;
  input: number[];
  target: number;
  expected: number;
}

/** values are decimal strings in the file, F(93) does not fit a double */
export interface FibonacciFixture {
  name: string;
  n: number;
  expected: bigint;
}

export interface FixtureSet {
  sort: SortFixture[];
  search: SearchFixture[];
  fibonacci: FibonacciFixture[];
}

const IsScope = (value: unknown): value is FixtureScope => {
  return value === 'all' || value === 'signed' || value === 'non-negative';
};

const IsInt32Value = (value: unknown): value is number => {
  return typeof value === 'number' && IsInt32(value);
};

/** fixture values follow the same int32 rule as command-line input */
const IsInt32List = (value: unknown): value is number[] => {
  return Array.isArray(value) && value.every(IsInt32Value);
};

const error_types: string[] = Object.values(SortErrorType);

const IsErrorType = (value: unknown): value is SortErrorType => {
  return typeof value === 'string' && error_types.includes(value);
};

const ReadSortFixture = (obj: unknown, source: string): SortFixture => {

  if (!IsRecord(obj) || typeof obj.name !== 'string' || !IsInt32List(obj.input)) {
    throw new ConfigError(source, 'sort fixtures need a name and an integer input list');
  }

  const fixture: SortFixture = {
    name: obj.name,
    scope: 'all',
    input: obj.input,
  };

  if (obj.scope !== undefined) {
    if (!IsScope(obj.scope)) {
      throw new ConfigError(source, `invalid scope in fixture "${obj.name}"`);
    }
    fixture.scope = obj.scope;
  }

  if (IsInt32List(obj.expected)) {
    fixture.expected = obj.expected;
  }
  else if (IsErrorType(obj.error)) {
    fixture.error = obj.error;
  }
  else {
    throw new ConfigError(source, `fixture "${obj.name}" needs an expected list or an error type`);
  }

  return fixture;

};

const ReadSearchFixture = (obj: unknown, source: string): SearchFixture => {

  if (!IsRecord(obj)
      || typeof obj.name !== 'string'
      || !IsInt32List(obj.input)
      || !IsInt32Value(obj.target)
      || !IsInt32Value(obj.expected)) {
    throw new ConfigError(source, 'search fixtures need a name, input, target and expected index');
  }

  return {
    name: obj.name,
    input: obj.input,
    target: obj.target,
    expected: obj.expected,
  };

};

const ReadFibonacciFixture = (obj: unknown, source: string): FibonacciFixture => {

  if (!IsRecord(obj)
      || typeof obj.name !== 'string'
      || !IsInt32Value(obj.n)
      || typeof obj.expected !== 'string'
      || !/^\d+$/.test(obj.expected)) {
    throw new ConfigError(source, 'fibonacci fixtures need a name, n and the expected value as a decimal string');
  }

  return {
    name: obj.name,
    n: obj.n,
    expected: BigInt(obj.expected),
  };

};

/** validate parsed fixture data */
export const ReadFixtureSet = (obj: unknown, source: string): FixtureSet => {

  if (!IsRecord(obj)) {
    throw new ConfigError(source, 'expected a JSON object');
  }

  const sort = Array.isArray(obj.sort) ? obj.sort : [];
  const search = Array.isArray(obj.search) ? obj.search : [];
  const fibonacci = Array.isArray(obj.fibonacci) ? obj.fibonacci : [];

  return {
    sort: sort.map(entry => ReadSortFixture(entry, source)),
    search: search.map(entry => ReadSearchFixture(entry, source)),
    fibonacci: fibonacci.map(entry => ReadFibonacciFixture(entry, source)),
  };

};

/**
 * load fixtures from a file, or the set bundled with the CLI if no
 * file is given.
 */
export const LoadFixtures = async (file?: string): Promise<FixtureSet> => {

  if (!file) {
    return ReadFixtureSet(bundled_fixtures, 'fixtures.json');
  }

  let obj: unknown;
  try {
    obj = JSON.parse(await fs.promises.readFile(file, {encoding: 'utf8'}));
  }
  catch (err) {
    throw new ConfigError(file, err instanceof Error ? err.message : String(err));
  }

  return ReadFixtureSet(obj, file);

};
