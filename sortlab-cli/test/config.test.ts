
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from 'sortlab-base-types';
import { DefaultConfig, MergeConfig, ReadConfig } from '../src/config';

let dir = '';

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sortlab-config-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  jest.restoreAllMocks();
});

test('defaults', async () => {

  const config = await ReadConfig();
  expect(config).toEqual({ benchmark_size: 10000, strategy: 'recursive', verbose: false });

  // a copy, not the shared default
  config.benchmark_size = 5;
  expect(DefaultConfig.benchmark_size).toBe(10000);

});

test('merge over defaults', () => {

  const config = MergeConfig({ strategy: 'iterative', benchmark_size: 500 }, '/work/sortlab.json');
  expect(config).toEqual({ benchmark_size: 500, strategy: 'iterative', verbose: false });

  // paths resolve against the config file
  const with_fixtures = MergeConfig({ fixtures: 'data/fixtures.json' }, '/work/sortlab.json');
  expect(with_fixtures.fixtures).toBe(path.resolve('/work', 'data/fixtures.json'));

});

test('invalid values', () => {

  expect(() => MergeConfig([], 'a.json')).toThrow(ConfigError);
  expect(() => MergeConfig({ benchmark_size: -1 }, 'a.json'))
    .toThrow('Invalid config file a.json: benchmark_size must be an integer from 1 to 10000000');
  expect(() => MergeConfig({ benchmark_size: 10000001 }, 'a.json')).toThrow(ConfigError);
  expect(() => MergeConfig({ benchmark_size: 2.5 }, 'a.json')).toThrow(ConfigError);
  expect(() => MergeConfig({ strategy: 'fast' }, 'a.json')).toThrow(ConfigError);
  expect(() => MergeConfig({ verbose: 'yes' }, 'a.json')).toThrow(ConfigError);
  expect(() => MergeConfig({ fixtures: 3 }, 'a.json')).toThrow(ConfigError);

});

test('unknown keys warn', () => {

  const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  MergeConfig({ color: true }, 'a.json');
  expect(warn).toHaveBeenCalledWith('ignoring unknown config key "color"');

});

test('read file', async () => {

  const file = path.join(dir, 'sortlab.json');
  fs.writeFileSync(file, JSON.stringify({ verbose: true, fixtures: 'mine.json' }));

  const config = await ReadConfig(file);
  expect(config.verbose).toBe(true);
  expect(config.fixtures).toBe(path.join(dir, 'mine.json'));

});

test('unreadable file', async () => {

  await expect(ReadConfig(path.join(dir, 'missing.json'))).rejects.toThrow(ConfigError);

  const file = path.join(dir, 'broken.json');
  fs.writeFileSync(file, '{ not json');
  await expect(ReadConfig(file)).rejects.toThrow(ConfigError);

});
