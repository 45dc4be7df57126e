import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import type { ZodError } from 'zod';
import {
    SettingsSchema,
    GrammarFileSchema,
    type Settings,
    type Grammar,
} from '@fatura/shared';
import { createGrammarRegistry, type GrammarRegistry } from '@fatura/core';
import { bundledGrammarsPath } from './paths.js';
import { errorMessage } from '../utils/errors.js';
import type { Workspace } from '../types.js';

/**
 * Formats zod issues as "path: message" pairs.
 */
function formatIssues(error: ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

function readYaml(path: string): unknown {
    const content = readFileSync(path, 'utf-8');
    return parse(content) ?? {};
}

/**
 * Loads workspace settings (config/settings.yaml), applying defaults.
 */
export function loadSettings(workspace: Workspace): Settings {
    const path = workspace.config.settingsPath;
    if (!existsSync(path)) {
        throw new Error(`Settings file not found: ${path}`);
    }

    const result = SettingsSchema.safeParse(readYaml(path));
    if (!result.success) {
        throw new Error(`Invalid settings in ${path}: ${formatIssues(result.error)}`);
    }
    return result.data;
}

/**
 * Path of the grammar table in effect: the workspace override when present,
 * otherwise the table bundled with the CLI.
 */
export function resolveGrammarsPath(workspace?: Workspace): string {
    if (workspace && existsSync(workspace.config.grammarsPath)) {
        return workspace.config.grammarsPath;
    }
    return bundledGrammarsPath();
}

/**
 * Loads and validates a grammar table file.
 */
export function loadGrammars(path: string): Grammar[] {
    if (!existsSync(path)) {
        throw new Error(`Grammar file not found: ${path}`);
    }

    const result = GrammarFileSchema.safeParse(readYaml(path));
    if (!result.success) {
        throw new Error(`Invalid grammars in ${path}: ${formatIssues(result.error)}`);
    }
    return result.data.grammars;
}

/**
 * Builds the grammar registry for a workspace (or the bundled table).
 */
export function loadRegistry(workspace?: Workspace): GrammarRegistry {
    const path = resolveGrammarsPath(workspace);
    try {
        return createGrammarRegistry(loadGrammars(path));
    } catch (err) {
        const message = errorMessage(err);
        if (message.includes(path)) throw err;
        throw new Error(`Invalid grammars in ${path}: ${message}`);
    }
}
