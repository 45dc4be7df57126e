import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadRegistry, resolveGrammarsPath } from '../workspace/config.js';
import { log, arrow, error } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import type { BanksOptions } from '../types.js';

/**
 * Lists the grammars in effect, in detection order.
 * Works outside a workspace with the bundled table.
 */
export function listBanks(options: BanksOptions): void {
    const root = options.workspace || detectWorkspaceRoot();
    const workspace = root ? resolveWorkspace(root) : undefined;

    try {
        const registry = loadRegistry(workspace);
        log(`Grammars (${resolveGrammarsPath(workspace)}):`);
        for (const grammar of registry.list()) {
            arrow(`${grammar.sourceId.padEnd(10)} ${grammar.dateFormat.padEnd(10)} ${grammar.names.join(', ')}`);
        }
    } catch (err) {
        error(`Error: ${errorMessage(err)}`);
        process.exit(1);
    }
}
