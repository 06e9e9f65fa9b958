import { Decimal } from 'decimal.js';
import {
  MAX_MONEY,
  bigintTransformer,
  exceedsMoneyLimit,
  formatMoney,
  moneyTransformer,
  toMoney,
} from './money';

describe('money', () => {
  describe('toMoney', () => {
    it.each([
      [1000, '1000.00'],
      ['12.5', '12.50'],
      [0.1, '0.10'],
      [new Decimal('3.99'), '3.99'],
      [-2, '-2.00'],
      ['9999999999999999.99', '9999999999999999.99'],
    ])('should parse %p', (input, expected) => {
      const amount = toMoney(input);
      expect(amount && formatMoney(amount)).toBe(expected);
    });

    it.each([
      0.001,
      '1.234',
      'ten',
      Number.POSITIVE_INFINITY,
      Number.NaN,
      '10000000000000000',
      '-10000000000000000',
      '1e20',
    ])(
      'should reject %p',
      (input) => {
        expect(toMoney(input)).toBeNull();
      },
    );
  });

  it('should cap amounts at sixteen integer digits', () => {
    expect(formatMoney(MAX_MONEY)).toBe('9999999999999999.99');
    expect(exceedsMoneyLimit(new Decimal('9999999999999999.99'))).toBe(false);
    expect(exceedsMoneyLimit(new Decimal('10000000000000000.00'))).toBe(true);
  });

  it('should store decimals as fixed two-digit strings', () => {
    expect(moneyTransformer.to(new Decimal('7.1'))).toBe('7.10');
    expect(moneyTransformer.to(undefined)).toBeUndefined();
  });

  it('should read decimal and bigint columns back from strings', () => {
    const balance = moneyTransformer.from('1500.00');
    expect(balance).toBeInstanceOf(Decimal);
    expect(formatMoney(balance)).toBe('1500.00');
    expect(bigintTransformer.from('870512345678')).toBe(870512345678);
    expect(bigintTransformer.from(null)).toBeNull();
  });
});
