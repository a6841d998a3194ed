
import {
  CreateFibonacciCache, FibonacciIterative, FibonacciMatrix, FibonacciMemoized,
  FibonacciOptimized, FibonacciRecursive, FibonacciTailRecursive,
} from '../src/fibonacci';

const known: Array<[number, bigint]> = [
  [0, 0n],
  [1, 1n],
  [2, 1n],
  [5, 5n],
  [10, 55n],
  [20, 6765n],
  [30, 832040n],
  [40, 102334155n],
  [50, 12586269025n],
  [90, 2880067194370816120n],
  [92, 7540113804746346429n],
  [93, 12200160415121876738n],
];

test('linear and logarithmic forms', () => {

  for (const [n, expected] of known) {
    expect(FibonacciIterative(n)).toBe(expected);
    expect(FibonacciMemoized(n)).toBe(expected);
    expect(FibonacciMatrix(n)).toBe(expected);
    expect(FibonacciTailRecursive(n)).toBe(expected);
    expect(FibonacciOptimized(n)).toBe(expected);
  }

});

test('recursive', () => {
  for (const [n, expected] of known.filter(([n]) => n <= 20)) {
    expect(FibonacciRecursive(n)).toBe(expected);
  }
});

test('first terms', () => {
  const terms = Array.from({ length: 11 }, (_, n) => FibonacciMatrix(n));
  expect(terms).toEqual([0n, 1n, 1n, 2n, 3n, 5n, 8n, 13n, 21n, 34n, 55n]);
});

test('past the 64-bit range', () => {
  // F(94) = F(92) + F(93), which no longer fits in 64 bits
  expect(FibonacciIterative(94)).toBe(19740274219868223167n);
  expect(FibonacciMatrix(94)).toBe(19740274219868223167n);
});

test('memo cache', () => {

  const cache = CreateFibonacciCache();
  expect(cache.size).toBe(2);

  expect(FibonacciMemoized(10, cache)).toBe(55n);
  expect(cache.size).toBe(11);
  expect(cache.get(9)).toBe(34n);

  // later calls read what earlier ones wrote
  cache.set(11, 1000n);
  expect(FibonacciMemoized(12, cache)).toBe(1055n);

  // an empty map is filled from the base cases
  const empty = new Map<number, bigint>();
  expect(FibonacciMemoized(5, empty)).toBe(5n);
  expect([...empty.keys()].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5]);

});
