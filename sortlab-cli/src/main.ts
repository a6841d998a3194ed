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

import { IsSortError } from 'sortlab-base-types';
import { FindAlgorithm } from 'sortlab-sort';
import { ParseArguments } from './arguments';
import { ReadConfig } from './config';
import { SortRunner } from './runner';

/**
 * run the CLI over arguments (without the node/script prefix).
 * resolves to the exit code.
 */
export const Main = async (argv: readonly string[]): Promise<number> => {

  try {

    const command_line = ParseArguments(argv);
    const config = await ReadConfig(command_line.config_file);

    // flags override the config file

    if (command_line.strategy) {
      config.strategy = command_line.strategy;
    }
    if (command_line.size) {
      config.benchmark_size = command_line.size;
    }
    if (command_line.verbose) {
      config.verbose = true;
    }

    const runner = new SortRunner(config);
    const { command, args } = command_line;
    const test_mode = args.length === 1 && args[0] === 'test';

    if (command === undefined) {
      return runner.Usage();
    }

    switch (command) {

      case 'help':
        runner.Usage();
        return 0;

      case 'list':
        return runner.List();

      case 'search':
        return test_mode ? await runner.SearchTest() : runner.Search(args);

      case 'fibonacci':
        if (test_mode) {
          return await runner.FibonacciTest();
        }
        if (args.length === 1 && args[0] === 'bench') {
          return runner.FibonacciBench();
        }
        return runner.Fibonacci(args);

      default: {
        const descriptor = FindAlgorithm(command);
        if (test_mode) {
          return await runner.Test(descriptor);
        }
        if (args.length === 1 && args[0] === 'bench') {
          return runner.Bench(descriptor);
        }
        return runner.Sort(descriptor, args);
      }

    }

  }
  catch (err) {
    if (IsSortError(err)) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

};
