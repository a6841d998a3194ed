
import { AllocationFailure } from 'sortlab-base-types';
import { FindAlgorithm } from 'sortlab-sort';
import { CreateFibonacciCache, FindVariant } from 'sortlab-fibonacci';
import { Benchmark, GenerateBenchmarkData, TimeFibonacci } from '../src/benchmark';

test('generated data', () => {
  expect(GenerateBenchmarkData(5)).toEqual([11, 48, 85, 122, 159]);
  expect(GenerateBenchmarkData(28)[27]).toBe(10);
  expect(GenerateBenchmarkData(0)).toEqual([]);
  expect(() => GenerateBenchmarkData(-1)).toThrow(AllocationFailure);
});

test('comparison sort', () => {

  const result = Benchmark(FindAlgorithm('heapsort'), 1000);

  expect(result.size).toBe(1000);
  expect(result.sorted).toBe(true);
  expect(result.elapsed).toBeGreaterThanOrEqual(0);
  expect(result.counters.comparisons).toBeGreaterThan(0);
  expect(result.counters.swaps).toBeGreaterThan(0);

});

test('non-comparison sort', () => {

  const result = Benchmark(FindAlgorithm('counting-sort'), 1000);

  expect(result.sorted).toBe(true);
  expect(result.counters).toEqual({ comparisons: 0, swaps: 0 });

});

test('iterative strategy', () => {
  for (const name of ['quicksort', 'quicksort-three-way', 'mergesort', 'heapsort']) {
    expect(Benchmark(FindAlgorithm(name), 2000, { strategy: 'iterative' }).sorted).toBe(true);
  }
});

test('fibonacci timing', () => {

  const timing = TimeFibonacci(FindVariant('optimized'), 90);
  expect(timing.n).toBe(90);
  expect(timing.value).toBe(2880067194370816120n);
  expect(timing.elapsed).toBeGreaterThanOrEqual(0);

  const cache = CreateFibonacciCache();
  expect(TimeFibonacci(FindVariant('memoized'), 40, { cache }).value).toBe(102334155n);
  expect(cache.get(40)).toBe(102334155n);

});
