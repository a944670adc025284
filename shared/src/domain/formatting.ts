/**
 * Money and Number Formatting Utilities
 *
 * Shared pure functions used by the chat tools, dashboard summaries and CLI.
 */

/** Round to cents. Avoids 0.1 + 0.2 style drift in totals. */
export function round2(value: number): number {
    return Math.round((value + Number.EPSILON) * 100) / 100;
}

/**
 * Format an amount in US dollars
 *
 * @example
 * formatCurrency(1234.5) // "$1,234.50"
 * formatCurrency(-5) // "-$5.00"
 */
export function formatCurrency(amount: number, locale = 'en-US'): string {
    if (!Number.isFinite(amount)) return '$0.00';

    return new Intl.NumberFormat(locale, {
        style: 'currency',
        currency: 'USD',
        minimumFractionDigits: 2,
        maximumFractionDigits: 2,
    }).format(amount);
}

/**
 * Human list of field names: "a", "a and b", "a, b and c"
 */
export function joinWithAnd(items: readonly string[]): string {
    if (items.length <= 1) return items.join('');
    return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
}
