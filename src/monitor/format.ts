import type { ChangeEvent } from '../data/price/types.js';

export function formatPrice(price: number): string {
    return `$${price.toFixed(2)}`;
}

/**
 * Two decimals with an explicit sign: +1.50, -0.25
 */
export function formatSigned(value: number): string {
    const fixed = value.toFixed(2);
    return value >= 0 ? `+${fixed}` : fixed;
}

/**
 * One-line human summary of a change event
 */
export function formatChangeEvent(event: ChangeEvent): string {
    if (event.kind === 'initial' || event.oldPrice === null) {
        return `Initial price ${formatPrice(event.newPrice)} (cycle ${event.newCycle})`;
    }

    return `${formatPrice(event.oldPrice)} → ${formatPrice(event.newPrice)} `
        + `(${formatSigned(event.delta)}, ${formatSigned(event.deltaPercent)}%) cycle ${event.newCycle}`;
}
