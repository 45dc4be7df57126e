import { describe, it, expect } from 'vitest';
import { createLearnedMatcher, scoreCandidate } from '../../src/categorizer/learned.js';
import { createInMemoryPatternRepository } from '../../src/categorizer/repository.js';
import { InvalidCorrectionError } from '../../src/errors.js';
import type { CategoryPattern } from '../../src/types/index.js';

describe('createLearnedMatcher', () => {
    async function matcherWithCorrection(description: string) {
        const repo = createInMemoryPatternRepository();
        const matcher = createLearnedMatcher(repo);
        await matcher.recordCorrection(description, 'alimentacao');
        return { repo, matcher };
    }

    describe('matchLearned', () => {
        it('returns an exact match after normalization', async () => {
            const { matcher } = await matcherWithCorrection('Supermercado ABC Ltda');

            expect(await matcher.matchLearned('SUPERMERCADO ABC LTDA.')).toEqual({
                found: true,
                category: 'alimentacao',
                confidence: 0.95,
                matchType: 'exact',
            });
        });

        it('ignores installment markers', async () => {
            const { matcher } = await matcherWithCorrection('Magazine Bela');
            const result = await matcher.matchLearned('MAGAZINE BELA Parcela 3/10');
            expect(result.matchType).toBe('exact');
        });

        it('returns a partial match above the minimum score', async () => {
            const { matcher } = await matcherWithCorrection('Supermercado ABC Ltda');
            const result = await matcher.matchLearned('Supermercado ABC Ltda Filial');

            expect(result.found).toBe(true);
            expect(result.matchType).toBe('partial');
            expect(result.confidence).toBeCloseTo(0.85);
        });

        it('rejects a score equal to the minimum', async () => {
            const { matcher } = await matcherWithCorrection('Supermercado ABC Ltda');

            expect(await matcher.matchLearned('Supermercado ABC Centro')).toEqual({
                found: false,
                confidence: 0,
                matchType: 'none',
            });
        });

        it('caps partial confidence', async () => {
            const repo = createInMemoryPatternRepository();
            const matcher = createLearnedMatcher(repo);
            for (let i = 0; i < 5; i++) {
                await matcher.recordCorrection('Supermercado ABC Ltda', 'alimentacao');
            }

            const result = await matcher.matchLearned('Supermercado ABC Ltda Filial');
            expect(result.confidence).toBe(0.9);
        });

        it('returns not found for an empty repository', async () => {
            const matcher = createLearnedMatcher(createInMemoryPatternRepository());
            expect((await matcher.matchLearned('PADARIA')).found).toBe(false);
        });

        it('returns not found for a description with nothing to match', async () => {
            const { matcher } = await matcherWithCorrection('Padaria');
            expect((await matcher.matchLearned('***')).found).toBe(false);
        });
    });

    describe('recordCorrection', () => {
        it('stores the normalized description', async () => {
            const { repo } = await matcherWithCorrection('IFOOD *Delivery - Parcela 2/6');
            expect(repo.list().map((p) => p.normalized_description)).toEqual(['ifood delivery']);
        });

        it('increments usage on repeat', async () => {
            const { repo, matcher } = await matcherWithCorrection('Padaria Central');
            const pattern = await matcher.recordCorrection('PADARIA CENTRAL', 'alimentacao');

            expect(pattern.usage_count).toBe(2);
            expect(repo.list()).toHaveLength(1);
        });

        it('rejects a description that normalizes to nothing', async () => {
            const matcher = createLearnedMatcher(createInMemoryPatternRepository());
            await expect(matcher.recordCorrection(' *** ', 'compras')).rejects.toBeInstanceOf(InvalidCorrectionError);
        });
    });
});

describe('scoreCandidate', () => {
    const candidate: CategoryPattern = {
        normalized_description: 'posto shell',
        category: 'transporte',
        usage_count: 7,
        confidence_seed: 1,
        created_at: '2026-01-01T00:00:00.000Z',
        last_used_at: '2026-01-01T00:00:00.000Z',
    };

    it('adds a capped usage bonus to the similarity', () => {
        expect(scoreCandidate(new Set(['posto', 'shell']), candidate)).toBeCloseTo(1.3);
        expect(scoreCandidate(new Set(['posto']), candidate)).toBeCloseTo(0.8);
    });
});
