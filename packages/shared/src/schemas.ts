/**
 * Zod schemas for Fatura Engine data structures.
 *
 * IMPORTANT: Amounts are stored as decimal strings with exactly two fraction
 * digits ("1234.56"). Convert to Decimal at computation boundaries only.
 */

import { z } from 'zod';
import { CATEGORIES, CONFIDENCE, FINGERPRINT, SETTINGS_DEFAULTS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Non-negative amount with 2-digit precision.
 */
const amountString = z.string().regex(/^\d+\.\d{2}$/, 'Must be a non-negative decimal with 2 fraction digits');

const fingerprint = z.string().regex(
    new RegExp(`^[0-9a-f]{${FINGERPRINT.LENGTH}}$`),
    `Must be ${FINGERPRINT.LENGTH}-char hex`
);

const unitInterval = z.number().min(0).max(1);

/**
 * Source text of a JavaScript regular expression.
 */
const regexSource = z.string().min(1).refine(
    (source) => {
        try {
            new RegExp(source);
            return true;
        } catch {
            return false;
        }
    },
    { message: 'Must be a valid regular expression' }
);

export const CategorySchema = z.enum(CATEGORIES);

export type Category = z.infer<typeof CategorySchema>;

// ============================================================================
// Grammar Schemas
// ============================================================================

/**
 * Per-grammar noise policy for extraction artifacts
 * (bare currency symbols, barcode-like digit runs, zero rows).
 */
export const NoiseFilterSchema = z.object({
    reject_description_patterns: z.array(regexSource).default([]),
    min_description_length: z.number().int().min(0).default(0),
    reject_zero_amount: z.boolean().default(false),
});

export type NoiseFilter = z.infer<typeof NoiseFilterSchema>;

/**
 * Parsing grammar for one statement source (issuing bank).
 *
 * `category_keywords` is ordered: the first category with a keyword hit wins.
 * `date_format` tokens: DD, MM, MMM, YYYY, YY.
 */
export const GrammarSchema = z.object({
    source_id: z.string().regex(/^[a-z0-9_]+$/, 'Must be lowercase snake_case'),
    names: z.array(z.string().min(1)).default([]),
    transaction_pattern: regexSource,
    installment_pattern: regexSource,
    date_format: z.string().regex(/(DD|MMM|MM|YYYY|YY)/, 'Must contain at least one date token'),
    currency_pattern: regexSource.optional(),
    locale: z.string().default('pt-BR'),
    category_keywords: z.record(CategorySchema, z.array(z.string().min(1))),
    noise_filter: NoiseFilterSchema.optional(),
});

export type Grammar = z.infer<typeof GrammarSchema>;
export type GrammarInput = z.input<typeof GrammarSchema>;

export const GrammarFileSchema = z.object({
    grammars: z.array(GrammarSchema).min(1),
});

export type GrammarFile = z.infer<typeof GrammarFileSchema>;

// ============================================================================
// Transaction Schema
// ============================================================================

export const CategorySourceSchema = z.enum(['keyword', 'learned', 'default']);

export type CategorySource = z.infer<typeof CategorySourceSchema>;

/**
 * Structured transaction - what every statement line becomes.
 * Installment fields are both present or both absent.
 */
export const TransactionSchema = z.object({
    date: isoDateString,
    description: z.string().min(1),
    amount: amountString,
    is_installment: z.boolean(),
    installment_current: z.number().int().min(1).optional(),
    installment_total: z.number().int().min(1).optional(),
    category: CategorySchema,
    category_source: CategorySourceSchema,
    confidence: unitInterval,
    source_id: z.string().min(1),
    origin_label: z.string(),
    fingerprint,
}).superRefine((txn, ctx) => {
    const hasCurrent = txn.installment_current !== undefined;
    const hasTotal = txn.installment_total !== undefined;
    if (hasCurrent !== hasTotal) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'installment_current and installment_total must both be present or both absent',
        });
    }
    if (txn.is_installment !== (hasCurrent && hasTotal)) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'is_installment must agree with the installment fields',
        });
    }
});

export type Transaction = z.infer<typeof TransactionSchema>;

// ============================================================================
// Learned Categorization Schemas
// ============================================================================

/**
 * Pattern learned from a manual category correction.
 */
export const CategoryPatternSchema = z.object({
    normalized_description: z.string().min(1),
    category: CategorySchema,
    usage_count: z.number().int().min(1),
    confidence_seed: unitInterval.default(CONFIDENCE.MANUAL_CORRECTION),
    created_at: z.string().datetime(),
    last_used_at: z.string().datetime(),
});

export type CategoryPattern = z.infer<typeof CategoryPatternSchema>;

export const CategoryPatternFileSchema = z.object({
    patterns: z.array(CategoryPatternSchema).default([]),
});

export type CategoryPatternFile = z.infer<typeof CategoryPatternFileSchema>;

/**
 * Result of matching a description against learned patterns.
 */
export const MatchResultSchema = z.discriminatedUnion('found', [
    z.object({
        found: z.literal(true),
        category: CategorySchema,
        confidence: unitInterval,
        matchType: z.enum(['exact', 'partial']),
    }),
    z.object({
        found: z.literal(false),
        confidence: z.literal(0),
        matchType: z.literal('none'),
    }),
]);

export type MatchResult = z.infer<typeof MatchResultSchema>;

// ============================================================================
// Workspace Settings Schema
// ============================================================================

export const SettingsSchema = z.object({
    default_source_id: z.string().min(1).default(SETTINGS_DEFAULTS.DEFAULT_SOURCE_ID),
    adaptive_threshold: unitInterval.default(CONFIDENCE.ADAPTIVE_ACCEPT),
    max_text_length: z.number().int().positive().default(SETTINGS_DEFAULTS.MAX_TEXT_LENGTH),
    origin_label: z.string().default(SETTINGS_DEFAULTS.ORIGIN_LABEL),
});

export type Settings = z.infer<typeof SettingsSchema>;
