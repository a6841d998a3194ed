
import { CreateCounters } from 'sortlab-base-types';
import { BuildMaxHeap, Heapify, Heapsort } from '../src/heapsort';
import { Generate, Sorted } from './generate';

const IsMaxHeap = (seq: number[], size: number) => {
  for (let i = 1; i < size; i++) {
    if (seq[Math.floor((i - 1) / 2)] < seq[i]) {
      return false;
    }
  }
  return true;
};

test('build heap', () => {

  const seq = [4, 2, 7, 1, 9, 3, 6, 5];
  BuildMaxHeap(seq, seq.length);

  expect(seq).toEqual([9, 5, 7, 4, 2, 3, 6, 1]);
  expect(IsMaxHeap(seq, seq.length)).toBeTruthy();

});

test('sift down', () => {

  // root out of place, both subtrees are heaps
  const seq = [1, 9, 8, 7, 6, 5, 4];
  Heapify(seq, seq.length, 0);

  expect(seq).toEqual([9, 7, 8, 1, 6, 5, 4]);
  expect(IsMaxHeap(seq, seq.length)).toBeTruthy();

});

test('scenarios', () => {

  const scenarios: Array<[number[], number[]]> = [
    [[64, 34, 25, 12, 22, 11, 90, 88], [11, 12, 22, 25, 34, 64, 88, 90]],
    [[5, 4, 3, 2, 1], [1, 2, 3, 4, 5]],
    [[7, 7, 7, 7, 7], [7, 7, 7, 7, 7]],
    [[3, 1, 4, 1, 5, 9, 2, 6], [1, 1, 2, 3, 4, 5, 6, 9]],
    [[3, 1, 4, 1, 5, 9, 2, 6, 5, 3], [1, 1, 2, 3, 3, 4, 5, 5, 6, 9]],
    [[2, 1], [1, 2]],
    [[], []],
    [[42], [42]],
  ];

  for (const [input, expected] of scenarios) {
    const recursive = input.slice(0);
    Heapsort(recursive);
    expect(recursive).toEqual(expected);

    const iterative = input.slice(0);
    Heapsort(iterative, { strategy: 'iterative' });
    expect(iterative).toEqual(expected);
  }

});

test('generated data', () => {

  for (let seed = 1; seed <= 20; seed++) {
    const input = Generate(seed * 7, seed);
    const seq = input.slice(0);
    Heapsort(seq, { strategy: seed % 2 ? 'recursive' : 'iterative' });
    expect(seq).toEqual(Sorted(input));
  }

});

test('counters', () => {

  // both strategies make the same comparisons and swaps
  const a = CreateCounters();
  const b = CreateCounters();
  Heapsort(Generate(64, 3), { counters: a });
  Heapsort(Generate(64, 3), { counters: b, strategy: 'iterative' });

  expect(a.comparisons).toBeGreaterThan(0);
  expect(b).toEqual(a);

});
