/**
 * Date parsing utilities for statement lines.
 * All dates are built in UTC (00:00:00Z) and formatted as YYYY-MM-DD.
 *
 * Statement dates often omit the year ("15/03") or use month abbreviations
 * in the issuer's language ("05 FEV"). Parsing never throws: the primary
 * format falls back to a free-form parser, and that falls back to "now".
 */

/**
 * Month abbreviations per locale, mapped to the English token the
 * format parser understands.
 */
export const MONTH_ABBREVIATIONS: Readonly<Record<string, Readonly<Record<string, string>>>> = {
    'pt-BR': {
        jan: 'jan', fev: 'feb', mar: 'mar', abr: 'apr', mai: 'may', jun: 'jun',
        jul: 'jul', ago: 'aug', set: 'sep', out: 'oct', nov: 'nov', dez: 'dec',
    },
    'en-US': {
        jan: 'jan', feb: 'feb', mar: 'mar', apr: 'apr', may: 'may', jun: 'jun',
        jul: 'jul', aug: 'aug', sep: 'sep', oct: 'oct', nov: 'nov', dec: 'dec',
    },
};

const ENGLISH_MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

type DateToken = 'DD' | 'MM' | 'MMM' | 'YYYY' | 'YY';

const TOKEN_PATTERNS: Record<DateToken, string> = {
    DD: '(\\d{1,2})',
    MM: '(\\d{1,2})',
    MMM: '(\\p{L}{3})',
    YYYY: '(\\d{4})',
    YY: '(\\d{2})',
};

interface CompiledDateFormat {
    regex: RegExp;
    tokens: DateToken[];
}

export type DateParseMethod = 'format' | 'freeform' | 'fallback';

export interface DateParseResult {
    /** ISO YYYY-MM-DD */
    date: string;
    method: DateParseMethod;
}

export interface DateParseOptions {
    locale?: string;
    /** Clock used for the assumed year and the last-resort fallback. */
    now?: Date;
}

const formatCache = new Map<string, CompiledDateFormat>();

/**
 * Compile a token format ("DD/MM", "DD MMM", "DD/MM/YY") to an anchored regex.
 * Whitespace in the format matches any run of whitespace.
 */
export function compileDateFormat(format: string): CompiledDateFormat {
    const cached = formatCache.get(format);
    if (cached) return cached;

    const tokens: DateToken[] = [];
    let source = '';
    const parts = format.match(/YYYY|YY|MMM|MM|DD|\s+|[^\s]/g) ?? [];
    for (const part of parts) {
        if (isDateToken(part)) {
            tokens.push(part);
            source += TOKEN_PATTERNS[part];
        } else if (/^\s+$/.test(part)) {
            source += '\\s+';
        } else {
            source += part.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
        }
    }

    const compiled = { regex: new RegExp(`^${source}$`, 'iu'), tokens };
    formatCache.set(format, compiled);
    return compiled;
}

function isDateToken(value: string): value is DateToken {
    return value in TOKEN_PATTERNS;
}

/**
 * Resolve a month abbreviation to 1-12 using the locale table,
 * falling back to English tokens.
 */
export function transliterateMonth(abbreviation: string, locale = 'pt-BR'): number | null {
    const key = abbreviation.toLowerCase();
    const table = MONTH_ABBREVIATIONS[locale];
    const token = table?.[key] ?? key;
    const index = ENGLISH_MONTHS.indexOf(token);
    return index === -1 ? null : index + 1;
}

/**
 * Parse a date using a token format. Missing year means the local year of `now`.
 */
export function parseWithFormat(
    value: string,
    format: string,
    options: DateParseOptions = {}
): Date | null {
    const { regex, tokens } = compileDateFormat(format);
    const match = value.trim().match(regex);
    if (!match) return null;

    const now = options.now ?? new Date();
    let day: number | null = null;
    let month: number | null = null;
    let year = now.getFullYear();

    for (let i = 0; i < tokens.length; i++) {
        const raw = match[i + 1];
        switch (tokens[i]) {
            case 'DD':
                day = parseInt(raw, 10);
                break;
            case 'MM':
                month = parseInt(raw, 10);
                break;
            case 'MMM':
                month = transliterateMonth(raw, options.locale);
                break;
            case 'YYYY':
                year = parseInt(raw, 10);
                break;
            case 'YY':
                year = expandTwoDigitYear(parseInt(raw, 10));
                break;
        }
    }

    if (day === null || month === null) return null;
    return buildUtcDate(year, month, day);
}

/**
 * Two-digit years: 69-99 are 1900s, 00-68 are 2000s.
 */
function expandTwoDigitYear(yy: number): number {
    return yy >= 69 ? 1900 + yy : 2000 + yy;
}

const FREEFORM_FORMATS = ['YYYY-MM-DD', 'DD/MM/YYYY', 'DD-MM-YYYY', 'DD.MM.YYYY', 'YYYY/MM/DD', 'DD MMM YYYY', 'DD/MM/YY', 'DD/MM'];

/**
 * Free-form date parser used when the grammar's format does not fit.
 * Day-first numeric layouts, ISO, and month names in the given locale or English.
 */
export function parseFreeformDate(value: string, options: DateParseOptions = {}): Date | null {
    const trimmed = value.trim();
    if (!trimmed) return null;

    for (const format of FREEFORM_FORMATS) {
        const date = parseWithFormat(trimmed, format, options);
        if (date) return date;
    }

    // Last attempt: whatever the runtime understands ("March 5, 2026").
    // Requires a month name and a full year; bare numbers parse to arbitrary dates.
    if (!/\p{L}{3,}/u.test(trimmed) || !/\d{4}/.test(trimmed)) return null;
    const timestamp = Date.parse(trimmed);
    if (isNaN(timestamp)) return null;
    const parsed = new Date(timestamp);
    return buildUtcDate(parsed.getFullYear(), parsed.getMonth() + 1, parsed.getDate());
}

/**
 * Parse a statement date. Never throws.
 *
 * Order: grammar format -> free-form -> `now`.
 */
export function parseStatementDate(
    value: string,
    format: string,
    options: DateParseOptions = {}
): DateParseResult {
    const primary = parseWithFormat(value, format, options);
    if (primary) {
        return { date: formatIsoDate(primary), method: 'format' };
    }

    const freeform = parseFreeformDate(value, options);
    if (freeform) {
        return { date: formatIsoDate(freeform), method: 'freeform' };
    }

    return { date: localIsoDate(options.now ?? new Date()), method: 'fallback' };
}

/**
 * Calendar day of `now` in the local time zone, as YYYY-MM-DD.
 */
function localIsoDate(now: Date): string {
    const year = now.getFullYear();
    const month = String(now.getMonth() + 1).padStart(2, '0');
    const day = String(now.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Build a UTC date, rejecting calendar rollovers (31/02 is not 03/03).
 */
export function buildUtcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
