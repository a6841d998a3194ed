
import { ParseInteger, ParseSequence } from '../src/parse';
import { ParseError, SortErrorType } from '../src/errors';

test('integers', () => {

  expect(ParseInteger('42')).toBe(42);
  expect(ParseInteger('+5')).toBe(5);
  expect(ParseInteger(' -7 ')).toBe(-7);
  expect(ParseInteger('007')).toBe(7);

  // no negative zero
  expect(Object.is(ParseInteger('-0'), 0)).toBeTruthy();

  // range boundaries
  expect(ParseInteger('2147483647')).toBe(2147483647);
  expect(ParseInteger('-2147483648')).toBe(-2147483648);

});

test('rejected text', () => {

  for (const text of ['', 'abc', '1.5', '1e3', '12abc', '0x10', '--1', '2147483648', '-2147483649']) {
    expect(() => ParseInteger(text)).toThrow(ParseError);
  }

});

test('sequences', () => {

  expect(ParseSequence([])).toEqual([]);
  expect(ParseSequence(['64', '34', '-25'])).toEqual([64, 34, -25]);

});

test('error position', () => {

  let error: unknown;
  try {
    ParseSequence(['3', '1', 'x'], 1);
  }
  catch (err) {
    error = err;
  }

  expect(error).toBeInstanceOf(ParseError);
  if (error instanceof ParseError) {
    expect(error.type).toBe(SortErrorType.Parse);
    expect(error.text).toBe('x');
    expect(error.position).toBe(3);
    expect(error.message).toBe('Invalid integer "x" at argument 4');
  }

});
