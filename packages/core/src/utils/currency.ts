/**
 * Currency parsing for statement amounts.
 *
 * Brazilian statements write "1.234,56"; some issuers write "45.90".
 * Malformed input becomes 0.00 rather than an error.
 */

import { Decimal } from 'decimal.js';
import { ZERO_AMOUNT } from '../types/index.js';

const CURRENCY_NOISE = /R\$|[$€£¥]|\s+/g;
const PLAIN_DECIMAL = /^-?(\d+\.?\d*|\.\d+)$/;

/**
 * Parse currency text into a non-negative amount with 2-digit precision.
 *
 * Separator rules:
 * - comma, no dot: comma is the decimal separator ("45,80")
 * - comma and dot: dot groups thousands, comma is decimal ("1.234,56")
 * - dot only: dot is the decimal separator ("45.80")
 *
 * @param text - Amount text as captured from the statement
 * @param currencyPattern - Optional grammar pattern; group 1 (or the whole match) is used
 * @returns Decimal string such as "1234.56", or "0.00" when unparseable
 */
export function parseCurrency(text: string, currencyPattern?: RegExp): string {
    if (!text) return ZERO_AMOUNT;

    let candidate = text;
    if (currencyPattern) {
        const match = candidate.match(currencyPattern);
        if (match) {
            candidate = match[1] ?? match[0];
        }
    }

    let clean = candidate.replace(CURRENCY_NOISE, '');

    if (clean.includes(',') && !clean.includes('.')) {
        clean = clean.replace(/,/g, '.');
    } else if (clean.includes(',') && clean.includes('.')) {
        clean = clean.replace(/\./g, '').replace(/,/g, '.');
    }

    if (!PLAIN_DECIMAL.test(clean)) {
        return ZERO_AMOUNT;
    }

    return new Decimal(clean)
        .abs()
        .toDecimalPlaces(2, Decimal.ROUND_HALF_UP)
        .toFixed(2);
}

/**
 * True when the amount string is zero.
 */
export function isZeroAmount(amount: string): boolean {
    return new Decimal(amount).isZero();
}
