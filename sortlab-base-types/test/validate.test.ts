
import { ValidateNonNegative, ValidateSorted } from '../src/validate';
import { AllocateBuffer, AllocateCounts } from '../src/allocate';
import { AllocationFailure, IsSortError, NegativeValuePrecondition, SortError, SortErrorType, UnsortedInput } from '../src/errors';

test('non-negative', () => {

  expect(() => ValidateNonNegative([])).not.toThrow();
  expect(() => ValidateNonNegative([0, 2, 3])).not.toThrow();
  expect(() => ValidateNonNegative([-1, 2, 3])).toThrow(NegativeValuePrecondition);

  // first offender is reported
  expect(() => ValidateNonNegative([4, -2, -3], 'Radix sort'))
    .toThrow('Radix sort only works with non-negative integers (found -2 at index 1)');

});

test('negative value error', () => {

  const error = new NegativeValuePrecondition(0, -1);
  expect(error).toBeInstanceOf(SortError);
  expect(error.type).toBe(SortErrorType.NegativeValue);
  expect(error.index).toBe(0);
  expect(error.value).toBe(-1);
  expect(error.message).toBe('This algorithm only works with non-negative integers (found -1 at index 0)');

});

test('sorted input', () => {

  expect(() => ValidateSorted([])).not.toThrow();
  expect(() => ValidateSorted([1, 1, 2])).not.toThrow();
  expect(() => ValidateSorted([1, 3, 2])).toThrow(UnsortedInput);
  expect(() => ValidateSorted([1, 3, 2])).toThrow('Input must be sorted (out of order at index 2)');

});

test('allocation', () => {

  expect(AllocateBuffer(0)).toEqual([]);
  expect(AllocateBuffer(3)).toEqual([0, 0, 0]);

  const counts = AllocateCounts(4);
  expect(counts.length).toBe(4);
  expect(Array.from(counts)).toEqual([0, 0, 0, 0]);

  // invalid lengths surface as allocation failures
  expect(() => AllocateBuffer(-1)).toThrow(AllocationFailure);
  expect(() => AllocateCounts(-1)).toThrow(AllocationFailure);
  expect(() => AllocateBuffer(1.5)).toThrow('Memory allocation failed (1.5 elements)');

});

test('error classification', () => {

  expect(IsSortError(new AllocationFailure(10))).toBeTruthy();
  expect(IsSortError(new Error('other'))).toBeFalsy();
  expect(IsSortError('text')).toBeFalsy();

});
