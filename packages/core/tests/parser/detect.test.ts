import { describe, it, expect } from 'vitest';
import { detectFormat, detectSourceId, buildLiteralTable } from '../../src/parser/detect.js';
import { createGrammarRegistry } from '../../src/grammar/index.js';
import { cardA, cardB } from '../fixtures/grammars.js';

describe('detectFormat', () => {
    const registry = createGrammarRegistry([cardA, cardB]);
    const options = { defaultSourceId: 'card_a' };

    it('detects by name literal, case-insensitively', () => {
        expect(detectFormat('Fatura NU PAGAMENTOS S.A.', registry, options)).toEqual({
            sourceId: 'card_a',
            method: 'literal',
            literal: 'nu pagamentos',
        });
    });

    it('prefers literals over patterns', () => {
        const text = 'Banco B\n15/03 PADARIA CENTRAL R$ 25,90';
        expect(detectFormat(text, registry, options).sourceId).toBe('card_b');
    });

    it('falls back to the first grammar whose pattern matches', () => {
        expect(detectFormat('05 FEV RESTAURANTE BREAD R$ 50,00', registry, options)).toEqual({
            sourceId: 'card_b',
            method: 'pattern',
        });
    });

    it('uses the default when nothing matches', () => {
        expect(detectFormat('nothing to see here', registry, { defaultSourceId: 'card_b' })).toEqual({
            sourceId: 'card_b',
            method: 'default',
        });
    });

    it('respects a custom literal table order', () => {
        const literals = [
            { literal: 'c6 bank', sourceId: 'card_b' },
            { literal: 'c6', sourceId: 'card_a' },
        ];
        expect(detectFormat('C6 BANK fatura', registry, { ...options, literals }).literal).toBe('c6 bank');
        expect(detectFormat('conta c6', registry, { ...options, literals }).sourceId).toBe('card_a');
    });

    it('skips literals for sources missing from the registry', () => {
        const literals = [{ literal: 'fatura', sourceId: 'unknown' }];
        expect(detectFormat('fatura', registry, { ...options, literals }).method).toBe('default');
    });
});

describe('buildLiteralTable', () => {
    it('lists grammar names in registry order', () => {
        const registry = createGrammarRegistry([cardB, cardA]);
        expect(buildLiteralTable(registry)).toEqual([
            { literal: 'banco b', sourceId: 'card_b' },
            { literal: 'nu pagamentos', sourceId: 'card_a' },
            { literal: 'nubank', sourceId: 'card_a' },
        ]);
    });
});

describe('detectSourceId', () => {
    it('returns only the source id', () => {
        const registry = createGrammarRegistry([cardA, cardB]);
        expect(detectSourceId('nubank', registry, { defaultSourceId: 'card_b' })).toBe('card_a');
    });
});
