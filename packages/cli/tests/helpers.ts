import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/** 2026-10-19T12:00:00Z */
export const NOW = new Date(Date.UTC(2026, 9, 19, 12));

export const NUBANK_STATEMENT = [
    'Nubank',
    'Fatura de março',
    '15/03 PADARIA CENTRAL R$ 25,90',
    '20/03 MAGAZINE BELA Parcela 7/7 R$ 1.234,56',
    '22/03 IFOOD DELIVERY 2/6 R$ 45,80',
].join('\n');

/**
 * Creates a throwaway workspace with config/settings.yaml and imports/.
 */
export function createTempWorkspace(settings = ''): string {
    const root = mkdtempSync(join(tmpdir(), 'fatura-'));
    mkdirSync(join(root, 'config'));
    mkdirSync(join(root, 'imports'));
    writeFileSync(join(root, 'config', 'settings.yaml'), settings);
    return root;
}

export function writeImport(root: string, filename: string, text: string): string {
    const path = join(root, 'imports', filename);
    writeFileSync(path, text);
    return path;
}

export function removeTempWorkspace(root: string): void {
    rmSync(root, { recursive: true, force: true });
}
