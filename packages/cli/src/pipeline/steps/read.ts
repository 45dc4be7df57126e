import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { PipelineStep, InputFile } from '../types.js';
import { hashText } from '../../utils/hash.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Lists statement files in a directory, sorted, skipping hidden and temporary files.
 */
async function listStatementFiles(dir: string): Promise<string[]> {
    const entries = (await readdir(dir)).sort();
    const paths: string[] = [];

    for (const filename of entries) {
        if (filename.startsWith('.') || filename.startsWith('~')) {
            continue;
        }
        const filePath = join(dir, filename);
        if ((await stat(filePath)).isFile()) {
            paths.push(filePath);
        }
    }

    return paths;
}

/**
 * Step 1: Read Statements
 * Loads the text of each input file (explicit paths, or the imports directory).
 * Empty and oversized files are per-file errors; no input at all is fatal.
 */
export const readFiles: PipelineStep = async (state) => {
    let paths: string[];
    try {
        paths = state.inputs.length > 0 ? state.inputs : await listStatementFiles(state.workspace.imports);
    } catch (err) {
        state.errors.push({
            step: 'read',
            message: `Error scanning directory ${state.workspace.imports}: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
        return state;
    }

    const files: InputFile[] = [];
    const maxLength = state.settings.max_text_length;

    for (const path of paths) {
        const filename = basename(path);
        try {
            const text = await readFile(path, 'utf-8');

            if (!text.trim()) {
                state.errors.push({ step: 'read', file: filename, message: `No text in ${filename}`, fatal: false });
                continue;
            }
            if (text.length > maxLength) {
                state.errors.push({
                    step: 'read',
                    file: filename,
                    message: `${filename} has ${text.length} characters, above max_text_length (${maxLength})`,
                    fatal: false,
                });
                continue;
            }

            files.push({ path, filename, hash: hashText(text), text });
        } catch (err) {
            state.errors.push({
                step: 'read',
                file: filename,
                message: `Failed to read ${filename}: ${errorMessage(err)}`,
                fatal: false,
                error: err,
            });
        }
    }

    state.files = files;

    if (files.length === 0) {
        state.errors.push({
            step: 'read',
            message: paths.length === 0
                ? `No statement files found in ${state.workspace.imports}`
                : 'None of the input files could be read',
            fatal: true,
        });
    }

    return state;
};
