import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

/**
 * Positive integer from a CLI or env value; anything else yields the fallback
 */
export function parsePositiveInt(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }

    const parsed = positiveInt.safeParse(raw.trim());
    return parsed.success ? parsed.data : fallback;
}
