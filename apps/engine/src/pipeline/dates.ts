const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Midnight UTC of the given instant's calendar day
 */
export function startOfUtcDay(date: Date): Date {
    return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function addDays(date: Date, days: number): Date {
    return new Date(date.getTime() + days * DAY_MS);
}

/**
 * YYYY-MM-DD of a UTC date
 */
export function toDateKey(date: Date): string {
    return date.toISOString().slice(0, 10);
}
