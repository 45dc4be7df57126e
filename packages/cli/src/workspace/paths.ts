import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Workspace } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        imports: join(root, 'imports'),
        config: {
            settingsPath: join(root, 'config', 'settings.yaml'),
            grammarsPath: join(root, 'config', 'grammars.yaml'),
            learnedPatternsPath: join(root, 'config', 'learned-patterns.yaml'),
        },
    };
}

/**
 * Grammar table shipped with the CLI.
 */
export function bundledGrammarsPath(): string {
    // In dev: packages/cli/src/workspace/paths.ts -> __dirname = packages/cli/src/workspace
    // In dist: packages/cli/dist/workspace/paths.js -> __dirname = packages/cli/dist/workspace
    const pkgRoot = join(__dirname, '..', '..');
    return join(pkgRoot, 'assets', 'grammars.yaml');
}
