import { CategorySchema, CATEGORIES } from '@fatura/shared';
import { createLearnedMatcher } from '@fatura/core';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { createYamlPatternRepository } from '../yaml/patterns.js';
import { success, log, arrow, error } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import type { CorrectOptions } from '../types.js';

/**
 * Records a manual category correction as a learned pattern.
 */
export async function correctCategory(description: string, category: string, options: CorrectOptions): Promise<void> {
    const parsed = CategorySchema.safeParse(category);
    if (!parsed.success) {
        error(`Error: Unknown category "${category}". Use one of: ${CATEGORIES.join(', ')}`);
        process.exit(1);
    }

    // 1. Workspace detection
    const root = options.workspace || detectWorkspaceRoot();
    if (!root) {
        error('Error: Workspace not found.');
        process.exit(1);
    }
    const workspace = resolveWorkspace(root);
    const patternsPath = workspace.config.learnedPatternsPath;

    // 2. Record the correction
    log(`Recording correction in: ${patternsPath}`);

    try {
        const repository = await createYamlPatternRepository(patternsPath);
        const pattern = await createLearnedMatcher(repository).recordCorrection(description, parsed.data);

        success('Correction recorded!');
        arrow(`Pattern:  "${pattern.normalized_description}"`);
        arrow(`Category: ${pattern.category}`);
        arrow(`Usage:    ${pattern.usage_count}`);
    } catch (err) {
        error(`Failed to record correction: ${errorMessage(err)}`);
        process.exit(1);
    }
}
