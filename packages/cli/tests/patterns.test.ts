import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { createLearnedMatcher } from '@fatura/core';
import { createYamlPatternRepository, readPatternFile } from '../src/yaml/patterns.js';
import { createTempWorkspace, removeTempWorkspace } from './helpers.js';

describe('YAML pattern repository', () => {
    const clock = () => new Date('2026-10-19T12:00:00.000Z');
    let root = '';
    let filePath = '';

    beforeEach(() => {
        root = createTempWorkspace();
        filePath = join(root, 'config', 'learned-patterns.yaml');
    });

    afterEach(() => {
        removeTempWorkspace(root);
    });

    it('starts empty when the file does not exist', async () => {
        const repo = await createYamlPatternRepository(filePath);

        expect(repo.list()).toEqual([]);
        expect(existsSync(filePath)).toBe(false);
    });

    it('writes the file on every upsert', async () => {
        const repo = await createYamlPatternRepository(filePath, { now: clock });
        await repo.upsert('magazine bela', 'compras');

        expect(await readPatternFile(filePath)).toEqual([
            {
                normalized_description: 'magazine bela',
                category: 'compras',
                usage_count: 1,
                confidence_seed: 1,
                created_at: '2026-10-19T12:00:00.000Z',
                last_used_at: '2026-10-19T12:00:00.000Z',
            },
        ]);
        expect(readFileSync(filePath, 'utf8').startsWith('# Learned category patterns.')).toBe(true);
    });

    it('creates the parent directory when missing', async () => {
        const nested = join(root, 'deep', 'dir', 'patterns.yaml');
        const repo = await createYamlPatternRepository(nested);
        await repo.upsert('posto shell', 'transporte');

        expect(existsSync(nested)).toBe(true);
    });

    it('reloads stored patterns', async () => {
        const first = await createYamlPatternRepository(filePath, { now: clock });
        await first.upsert('magazine bela', 'compras');
        await first.upsert('magazine bela', 'compras');

        const second = await createYamlPatternRepository(filePath);
        const pattern = await second.exactLookup('magazine bela');

        expect(pattern?.usage_count).toBe(2);
    });

    it('keeps every concurrent correction', async () => {
        const repo = await createYamlPatternRepository(filePath, { now: clock });
        await Promise.all([
            repo.upsert('posto shell', 'transporte'),
            repo.upsert('posto shell', 'transporte'),
            repo.upsert('farmacia sao joao', 'saude'),
        ]);

        const stored = await readPatternFile(filePath);
        expect(stored.map((p) => [p.normalized_description, p.usage_count])).toEqual([
            ['posto shell', 2],
            ['farmacia sao joao', 1],
        ]);
    });

    it('serves the learned matcher', async () => {
        const repo = await createYamlPatternRepository(filePath, { now: clock });
        const matcher = createLearnedMatcher(repo);
        await matcher.recordCorrection('Supermercado ABC Ltda', 'alimentacao');

        const reopened = createLearnedMatcher(await createYamlPatternRepository(filePath));
        expect(await reopened.matchLearned('SUPERMERCADO ABC LTDA')).toEqual({
            found: true,
            category: 'alimentacao',
            confidence: 0.95,
            matchType: 'exact',
        });
    });

    it('treats an empty file as no patterns', async () => {
        writeFileSync(filePath, '');
        expect(await readPatternFile(filePath)).toEqual([]);
    });

    it('rejects a malformed file', async () => {
        writeFileSync(filePath, 'patterns:\n  - normalized_description: x\n    category: viagem\n');
        await expect(createYamlPatternRepository(filePath)).rejects.toThrow(`Invalid learned patterns in ${filePath}`);
    });
});
