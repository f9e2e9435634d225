const OFFSET_SUFFIX = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

/**
 * Parses an API timestamp as UTC.
 * Open-Meteo returns '2026-02-16T14:00' (no offset) when asked for timezone=UTC,
 * which Date would otherwise read as local time. Numbers are unix seconds.
 */
export function parseUtcTimestamp(value: unknown): Date | null {
    let date: Date;
    if (typeof value === 'number' && Number.isFinite(value)) {
        date = new Date(value * 1000);
    } else if (typeof value === 'string' && value.trim().length > 0) {
        const text = value.trim();
        date = new Date(OFFSET_SUFFIX.test(text) || !text.includes('T') ? text : `${text}Z`);
    } else {
        return null;
    }
    return Number.isNaN(date.getTime()) ? null : date;
}

export function toUtcDateString(date: Date): string {
    return date.toISOString().slice(0, 10);
}
