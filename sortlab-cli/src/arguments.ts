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

import { IsStrategy, ParseInteger, UsageError, type Strategy } from 'sortlab-base-types';
import { IsBenchmarkSize, MAX_BENCHMARK_SIZE } from './config';

export interface CommandLine {

  /** first positional: an algorithm name, `search`, `fibonacci`, `list` or `help` */
  command?: string;

  /** remaining positionals, unparsed */
  args: string[];

  config_file?: string;
  strategy?: Strategy;
  size?: number;
  verbose?: boolean;

}

/**
 * flags may appear anywhere. anything that is not a known flag is a
 * positional, which lets negative numbers like `-5` through.
 */
export const ParseArguments = (argv: readonly string[]): CommandLine => {

  const positional: string[] = [];
  const command_line: CommandLine = { args: [] };

  const Value = (index: number, flag: string): string => {
    const value = argv[index];
    if (value === undefined) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {

      case '-c':
      case '--config':
        command_line.config_file = Value(++i, arg);
        break;

      case '--strategy': {
        const strategy = Value(++i, arg);
        if (!IsStrategy(strategy)) {
          throw new UsageError(`Invalid strategy "${strategy}" (expected recursive or iterative)`);
        }
        command_line.strategy = strategy;
        break;
      }

      case '--size': {
        const size = ParseInteger(Value(++i, arg), i);
        if (!IsBenchmarkSize(size)) {
          throw new UsageError(`Invalid size ${size} (expected 1 to ${MAX_BENCHMARK_SIZE})`);
        }
        command_line.size = size;
        break;
      }

      case '--verbose':
        command_line.verbose = true;
        break;

      case '-h':
      case '--help':
        positional.unshift('help');
        break;

      default:
        positional.push(arg);
    }
  }

  command_line.command = positional[0];
  command_line.args = positional.slice(1);

  return command_line;

};
