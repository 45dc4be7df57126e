import type { GrammarInput } from '../../src/types/index.js';

/**
 * Two small grammars with distinct line shapes:
 * - card_a: "15/03 PADARIA CENTRAL R$ 25,90"
 * - card_b: "05 FEV RESTAURANTE BREAD R$ 50,00"
 */
export const cardA: GrammarInput = {
    source_id: 'card_a',
    names: ['Nu Pagamentos', 'nubank'],
    transaction_pattern: '^(\\d{2}/\\d{2})\\s+(.+?)\\s+R\\$\\s*([\\d.,]+)$',
    installment_pattern: '(\\d+)\\s*/\\s*(\\d+)',
    date_format: 'DD/MM',
    category_keywords: {
        alimentacao: ['padaria', 'ifood', 'restaurante', 'supermercado'],
        transporte: ['uber', 'posto'],
        compras: ['loja'],
    },
};

export const cardB: GrammarInput = {
    source_id: 'card_b',
    names: ['banco b'],
    transaction_pattern: '^(\\d{2}\\s+[a-z]{3})\\s+(.+?)\\s+R\\$\\s*([\\d.,]+)$',
    installment_pattern: 'parc\\s*(\\d+)\\s*/\\s*(\\d+)',
    date_format: 'DD MMM',
    category_keywords: {
        alimentacao: ['restaurante'],
    },
    noise_filter: {
        reject_description_patterns: ['^R\\$$'],
        min_description_length: 2,
        reject_zero_amount: true,
    },
};

/** 2026-10-19T12:00:00Z */
export const NOW = new Date(Date.UTC(2026, 9, 19, 12));
