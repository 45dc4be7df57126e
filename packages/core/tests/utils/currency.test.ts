import { describe, it, expect } from 'vitest';
import { parseCurrency, isZeroAmount } from '../../src/utils/currency.js';

describe('parseCurrency', () => {
    it('treats a lone comma as the decimal separator', () => {
        expect(parseCurrency('45,80')).toBe('45.80');
    });

    it('treats dots as thousands separators when a comma is present', () => {
        expect(parseCurrency('R$ 1.234,56')).toBe('1234.56');
        expect(parseCurrency('1.234.567,89')).toBe('1234567.89');
    });

    it('treats a lone dot as the decimal separator', () => {
        expect(parseCurrency('45.8')).toBe('45.80');
    });

    it('strips currency symbols and whitespace', () => {
        expect(parseCurrency('R$  12,00')).toBe('12.00');
        expect(parseCurrency('$ 7')).toBe('7.00');
    });

    it('returns the absolute value', () => {
        expect(parseCurrency('-45,80')).toBe('45.80');
    });

    it('rounds half up to two places', () => {
        expect(parseCurrency('0,005')).toBe('0.01');
        expect(parseCurrency('10,004')).toBe('10.00');
    });

    it('returns 0.00 for malformed input', () => {
        expect(parseCurrency('')).toBe('0.00');
        expect(parseCurrency('abc')).toBe('0.00');
        expect(parseCurrency('12,3a')).toBe('0.00');
    });

    it('uses the first group of the currency pattern when it matches', () => {
        expect(parseCurrency('total R$ 10,00 pago', /R\$\s*([\d.,]+)/i)).toBe('10.00');
    });

    it('ignores a currency pattern that does not match', () => {
        expect(parseCurrency('10,00', /USD\s*([\d.]+)/)).toBe('10.00');
    });
});

describe('isZeroAmount', () => {
    it('detects zero', () => {
        expect(isZeroAmount('0.00')).toBe(true);
        expect(isZeroAmount('0.01')).toBe(false);
    });
});
