import { describe, it, expect } from 'vitest';
import { normalizeForLearning, tokenize, extractKeywords, jaccard } from '../../src/utils/normalize.js';

describe('normalizeForLearning', () => {
    it('lowercases and replaces punctuation with spaces', () => {
        expect(normalizeForLearning('UBER*TRIP')).toBe('uber trip');
    });

    it('removes "parcela n/m" markers', () => {
        expect(normalizeForLearning('IFOOD *Delivery - Parcela 2/6')).toBe('ifood delivery');
    });

    it('removes "parcela n de m" markers', () => {
        expect(normalizeForLearning('Loja Moda Parcela 3 de 10')).toBe('loja moda');
    });

    it('removes abbreviated markers', () => {
        expect(normalizeForLearning('Curso PARC.03/12')).toBe('curso');
    });

    it('removes ordinal markers', () => {
        expect(normalizeForLearning('Loja X 3ª de 10')).toBe('loja x');
    });

    it('removes bare n/m markers', () => {
        expect(normalizeForLearning('NETFLIX 2/6')).toBe('netflix');
    });

    it('keeps accented letters', () => {
        expect(normalizeForLearning('Café São João')).toBe('café são joão');
    });

    it('keeps digits outside installment markers', () => {
        expect(normalizeForLearning('POSTO 24H BR-101')).toBe('posto 24h br 101');
    });

    it('collapses whitespace and trims', () => {
        expect(normalizeForLearning('  Posto   Shell  ')).toBe('posto shell');
    });

    it('returns empty string when nothing is left', () => {
        expect(normalizeForLearning(' *** ')).toBe('');
    });
});

describe('tokenize', () => {
    it('returns distinct tokens', () => {
        expect([...tokenize('abc abc def')]).toEqual(['abc', 'def']);
    });

    it('returns an empty set for empty text', () => {
        expect(tokenize('').size).toBe(0);
    });
});

describe('extractKeywords', () => {
    it('drops short tokens and stop words', () => {
        expect(extractKeywords('pao de acucar para todos')).toEqual(['pao', 'acucar', 'todos']);
    });

    it('keeps every long token', () => {
        expect(extractKeywords('supermercado abc ltda')).toEqual(['supermercado', 'abc', 'ltda']);
    });
});

describe('jaccard', () => {
    it('computes intersection over union', () => {
        expect(jaccard(new Set(['a', 'b']), new Set(['b', 'c']))).toBeCloseTo(1 / 3);
    });

    it('returns 1 for equal sets', () => {
        expect(jaccard(new Set(['a']), new Set(['a']))).toBe(1);
    });

    it('returns 0 for two empty sets', () => {
        expect(jaccard(new Set(), new Set())).toBe(0);
    });
});
