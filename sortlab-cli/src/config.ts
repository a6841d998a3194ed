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
import * as path from 'path';
import { ConfigError, IsStrategy, type Strategy } from 'sortlab-base-types';

export interface Config {

  /** elements in the generated benchmark array */
  benchmark_size: number;

  /** recursion strategy for quicksort, three-way, mergesort, heapsort */
  strategy: Strategy;

  /** fixture file for self-tests. the bundled fixtures if unset */
  fixtures?: string;

  /** timestamp log lines */
  verbose: boolean;

}

/** largest benchmark array we will generate */
export const MAX_BENCHMARK_SIZE = 10000000;

export const IsBenchmarkSize = (value: unknown): value is number => {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 && value <= MAX_BENCHMARK_SIZE;
};

export const DefaultConfig: Config = {
  benchmark_size: 10000,
  strategy: 'recursive',
  verbose: false,
};

export const IsRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

/**
 * check a parsed config object and merge it over the defaults. paths
 * in the file are relative to the file's own directory.
 */
export const MergeConfig = (obj: unknown, file: string, base: Config = DefaultConfig): Config => {

  if (!IsRecord(obj)) {
    throw new ConfigError(file, 'expected a JSON object');
  }

  const config: Config = { ...base };
  const config_dir = path.dirname(file);

  for (const [key, value] of Object.entries(obj)) {
    switch (key) {

      case 'benchmark_size':
        if (!IsBenchmarkSize(value)) {
          throw new ConfigError(file, `benchmark_size must be an integer from 1 to ${MAX_BENCHMARK_SIZE}`);
        }
        config.benchmark_size = value;
        break;

      case 'strategy':
        if (!IsStrategy(value)) {
          throw new ConfigError(file, 'strategy must be "recursive" or "iterative"');
        }
        config.strategy = value;
        break;

      case 'fixtures':
        if (typeof value !== 'string') {
          throw new ConfigError(file, 'fixtures must be a path');
        }
        config.fixtures = path.resolve(config_dir, value);
        break;

      case 'verbose':
        if (typeof value !== 'boolean') {
          throw new ConfigError(file, 'verbose must be true or false');
        }
        config.verbose = value;
        break;

      default:
        console.warn(`ignoring unknown config key "${key}"`);
    }
  }

  return config;

};

export const ReadConfig = async (file?: string): Promise<Config> => {

  if (!file) {
    return { ...DefaultConfig };
  }

  let text: string;
  try {
    text = await fs.promises.readFile(file, {encoding: 'utf8'});
  }
  catch (err) {
    throw new ConfigError(file, err instanceof Error ? err.message : String(err));
  }

  let obj: unknown;
  try {
    obj = JSON.parse(text);
  }
  catch (err) {
    throw new ConfigError(file, err instanceof Error ? err.message : String(err));
  }

  return MergeConfig(obj, file);

};
