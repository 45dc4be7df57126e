import { describe, it, expect } from 'vitest';
import { classifyByKeyword } from '../../src/categorizer/keyword.js';
import { compileGrammar } from '../../src/grammar/index.js';
import { cardA } from '../fixtures/grammars.js';

describe('classifyByKeyword', () => {
    const grammar = compileGrammar(cardA);

    it('matches keywords as case-insensitive substrings', () => {
        expect(classifyByKeyword('IFOOD *DELIVERY', grammar)).toBe('alimentacao');
        expect(classifyByKeyword('UBER TRIP SAO PAULO', grammar)).toBe('transporte');
    });

    it('returns the first category in table order', () => {
        expect(classifyByKeyword('LOJA DO POSTO', grammar)).toBe('transporte');
    });

    it('returns outros without a hit', () => {
        expect(classifyByKeyword('MAGAZINE BELA', grammar)).toBe('outros');
    });

    it('returns outros for an empty table', () => {
        expect(classifyByKeyword('PADARIA', { categoryKeywords: [] })).toBe('outros');
    });
});
