import { InputValidationError } from '../src/errors';
import { formatMoney, parseMoney, percentOf, toDecimal } from '../src/money';

test.each<[string, number]>([
  ['39.98', 3998],
  ['$20', 2000],
  [' 0.5 ', 50],
  ['1000.00', 100000],
])('parseMoney(%p) is %p cents', (input, cents) => {
  expect(parseMoney(input)).toBe(cents);
});

test.each(['', 'abc', '-1', '1.234', '1,000'])('parseMoney rejects %p', (input) => {
  expect(() => parseMoney(input)).toThrow(InputValidationError);
});

test('formatMoney and toDecimal', () => {
  expect(formatMoney(5998)).toBe('$59.98');
  expect(formatMoney(5)).toBe('$0.05');
  expect(formatMoney(-200)).toBe('-$2.00');
  expect(toDecimal(3798)).toBe('37.98');
});

test('percentOf rounds to the nearest cent', () => {
  expect(percentOf(3998, 5)).toBe(200);
  expect(percentOf(3998, 20)).toBe(800);
  expect(percentOf(1010, 5)).toBe(51);
});
