
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError, SortErrorType } from 'sortlab-base-types';
import { LoadFixtures, ReadFixtureSet } from '../src/fixtures';

test('bundled fixtures', async () => {

  const fixtures = await LoadFixtures();

  expect(fixtures.sort.length).toBe(13);
  expect(fixtures.search.length).toBe(13);
  expect(fixtures.fibonacci.length).toBe(10);
  expect(fixtures.fibonacci[9]).toEqual({ name: 'fib(93)', n: 93, expected: 12200160415121876738n });

  const rejection = fixtures.sort.find(fixture => fixture.name === 'rejects negative input');
  expect(rejection).toEqual({
    name: 'rejects negative input',
    scope: 'non-negative',
    input: [-1, 2, 3],
    error: SortErrorType.NegativeValue,
  });

});

test('read fixture set', () => {

  const fixtures = ReadFixtureSet({
    sort: [{ name: 'pair', input: [2, 1], expected: [1, 2] }],
  }, 'inline');

  // scope defaults to all, missing lists are empty
  expect(fixtures).toEqual({
    sort: [{ name: 'pair', scope: 'all', input: [2, 1], expected: [1, 2] }],
    search: [],
    fibonacci: [],
  });

});

test('invalid fixtures', () => {

  expect(() => ReadFixtureSet('nope', 'inline')).toThrow(ConfigError);
  expect(() => ReadFixtureSet({ sort: [{ name: 'x', input: [1.5] , expected: [] }] }, 'inline')).toThrow(ConfigError);
  expect(() => ReadFixtureSet({ sort: [{ name: 'x', input: [1] }] }, 'inline'))
    .toThrow('Invalid config file inline: fixture "x" needs an expected list or an error type');
  expect(() => ReadFixtureSet({ sort: [{ name: 'x', scope: 'odd', input: [1], expected: [1] }] }, 'inline'))
    .toThrow('Invalid config file inline: invalid scope in fixture "x"');
  expect(() => ReadFixtureSet({ sort: [{ name: 'x', input: [1], error: 'BOOM' }] }, 'inline')).toThrow(ConfigError);
  expect(() => ReadFixtureSet({ search: [{ name: 'x', input: [1], target: 1 }] }, 'inline')).toThrow(ConfigError);

});

test('fibonacci fixtures', () => {

  const fixtures = ReadFixtureSet({ fibonacci: [{ name: 'f', n: 12, expected: '144' }] }, 'inline');
  expect(fixtures.fibonacci).toEqual([{ name: 'f', n: 12, expected: 144n }]);

  expect(() => ReadFixtureSet({ fibonacci: [{ name: 'f', n: 12, expected: 144 }] }, 'inline'))
    .toThrow('Invalid config file inline: fibonacci fixtures need a name, n and the expected value as a decimal string');
  expect(() => ReadFixtureSet({ fibonacci: [{ name: 'f', n: 12, expected: '1e3' }] }, 'inline')).toThrow(ConfigError);
  expect(() => ReadFixtureSet({ fibonacci: [{ name: 'f', n: 1.5, expected: '1' }] }, 'inline')).toThrow(ConfigError);

});

test('fixture values stay within int32', () => {

  expect(() => ReadFixtureSet({ sort: [{ name: 'x', input: [2147483648], expected: [2147483648] }] }, 'inline'))
    .toThrow('Invalid config file inline: sort fixtures need a name and an integer input list');
  expect(() => ReadFixtureSet({ sort: [{ name: 'x', input: [1], expected: [-2147483649] }] }, 'inline'))
    .toThrow(ConfigError);
  expect(() => ReadFixtureSet({ search: [{ name: 'x', input: [1], target: 1.5, expected: -1 }] }, 'inline'))
    .toThrow(ConfigError);
  expect(() => ReadFixtureSet({ search: [{ name: 'x', input: [1], target: 1, expected: 0.5 }] }, 'inline'))
    .toThrow(ConfigError);
  expect(() => ReadFixtureSet({ search: [{ name: 'x', input: [1], target: 4294967296, expected: -1 }] }, 'inline'))
    .toThrow(ConfigError);

  const extremes = ReadFixtureSet({
    sort: [{ name: 'x', input: [2147483647, -2147483648], expected: [-2147483648, 2147483647] }],
  }, 'inline');
  expect(extremes.sort[0].input).toEqual([2147483647, -2147483648]);

});

test('fixture file', async () => {

  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sortlab-fixtures-'));

  try {
    const file = path.join(dir, 'fixtures.json');
    fs.writeFileSync(file, JSON.stringify({ search: [{ name: 'hit', input: [1, 2], target: 2, expected: 1 }] }));

    const fixtures = await LoadFixtures(file);
    expect(fixtures.sort).toEqual([]);
    expect(fixtures.search).toEqual([{ name: 'hit', input: [1, 2], target: 2, expected: 1 }]);

    await expect(LoadFixtures(path.join(dir, 'missing.json'))).rejects.toThrow(ConfigError);
  }
  finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }

});
