/**
 * Installment marker detection ("2/6", "PARC 2/6", "(2/6)", "- Parcela 2/6").
 * Each grammar supplies its own marker pattern with groups (current, total).
 */

export interface InstallmentInfo {
    isInstallment: boolean;
    current?: number;
    total?: number;
}

const NOT_INSTALLMENT: InstallmentInfo = { isInstallment: false };

/**
 * Search a description for the grammar's installment marker.
 *
 * A marker whose numbers are not a valid position (0, or current > total)
 * is not treated as an installment.
 *
 * @param description - Transaction description
 * @param installmentPattern - Grammar pattern with two capture groups
 */
export function parseInstallment(description: string, installmentPattern: RegExp | string): InstallmentInfo {
    const pattern = typeof installmentPattern === 'string'
        ? new RegExp(installmentPattern, 'i')
        : installmentPattern;

    const match = description.match(pattern);
    if (!match || match[1] === undefined || match[2] === undefined) {
        return NOT_INSTALLMENT;
    }

    const current = parseInt(match[1], 10);
    const total = parseInt(match[2], 10);

    if (!Number.isInteger(current) || !Number.isInteger(total) || current < 1 || total < 1 || current > total) {
        return NOT_INSTALLMENT;
    }

    return { isInstallment: true, current, total };
}
