import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { stringify, parse } from 'yaml';
import { CategoryPatternFileSchema, type Category, type CategoryPattern } from '@fatura/shared';
import {
    createInMemoryPatternRepository,
    type InMemoryPatternRepository,
    type InMemoryRepositoryOptions,
} from '@fatura/core';

const FILE_HEADER = '# Learned category patterns. Written by `fatura correct`; safe to edit by hand.\n';

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Reads stored patterns from a YAML file. A missing file means no patterns.
 */
export async function readPatternFile(filePath: string): Promise<CategoryPattern[]> {
    let content: string;
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (isNotFound(err)) return [];
        throw err;
    }

    const result = CategoryPatternFileSchema.safeParse(parse(content) ?? {});
    if (!result.success) {
        throw new Error(`Invalid learned patterns in ${filePath}: ${result.error.issues[0]?.message ?? 'unknown error'}`);
    }
    return result.data.patterns;
}

/**
 * PatternRepository persisted to a YAML file.
 *
 * Lookups are served from memory. Every upsert rewrites the file; writes are
 * queued so two corrections never interleave on disk.
 */
export async function createYamlPatternRepository(
    filePath: string,
    options: InMemoryRepositoryOptions = {}
): Promise<InMemoryPatternRepository> {
    const memory = createInMemoryPatternRepository(await readPatternFile(filePath), options);
    let queue: Promise<void> = Promise.resolve();

    async function write(): Promise<void> {
        await mkdir(dirname(filePath), { recursive: true });
        await writeFile(filePath, FILE_HEADER + stringify({ patterns: memory.list() }));
    }

    function save(): Promise<void> {
        const next = queue.then(write);
        // A failed write must not block later ones; the caller still gets the rejection.
        queue = next.catch(() => undefined);
        return next;
    }

    return {
        exactLookup: (normalizedDescription) => memory.exactLookup(normalizedDescription),
        keywordLookup: (keyword, limit, sortBy) => memory.keywordLookup(keyword, limit, sortBy),
        async upsert(normalizedDescription: string, category: Category): Promise<CategoryPattern> {
            const pattern = await memory.upsert(normalizedDescription, category);
            await save();
            return pattern;
        },
        list: () => memory.list(),
    };
}
