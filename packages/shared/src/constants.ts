/**
 * Constants for Fatura Engine.
 */

/**
 * Categories a transaction can be assigned to.
 * `outros` is the fallback when nothing else matched.
 */
export const CATEGORIES = [
    'alimentacao',
    'transporte',
    'saude',
    'compras',
    'servicos',
    'outros',
] as const;

export const UNCATEGORIZED_CATEGORY = 'outros';

/**
 * Confidence scores per categorization source.
 */
export const CONFIDENCE = {
    MANUAL_CORRECTION: 1.0,
    EXACT: 0.95,
    PARTIAL_CAP: 0.9,
    KEYWORD: 0.8,
    ADAPTIVE_ACCEPT: 0.7,
    PARTIAL_MIN: 0.6,
    DEFAULT: 0.3,
} as const;

/**
 * Learned-pattern matching parameters.
 */
export const LEARNING = {
    USAGE_BONUS_STEP: 0.1,
    USAGE_BONUS_CAP: 0.3,
    CANDIDATES_PER_KEYWORD: 5,
    MIN_KEYWORD_LENGTH: 3,
} as const;

/**
 * Fingerprint configuration.
 * SHA-256 hex digest over the "|"-joined key.
 */
export const FINGERPRINT = {
    LENGTH: 64,
    SEPARATOR: '|',
} as const;

/**
 * Amount returned for unparseable currency text.
 */
export const ZERO_AMOUNT = '0.00';

/**
 * Workspace defaults, applied when config/settings.yaml omits a key.
 */
export const SETTINGS_DEFAULTS = {
    DEFAULT_SOURCE_ID: 'nubank',
    ORIGIN_LABEL: 'principal',
    MAX_TEXT_LENGTH: 2_000_000,
} as const;
