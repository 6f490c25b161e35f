/**
 * Normalizer: canonical forms for comparison.
 *
 * Never throws; anything it cannot read becomes null. Every function is
 * idempotent on its own output.
 */

const DAY_FIRST = /^(\d{1,2})([-/])(\d{1,2})\2(\d{4})$/;
const YEAR_FIRST = /^(\d{4})([-/])(\d{1,2})\2(\d{1,2})$/;
const ISO_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T/;
const INTEGER = /^[+-]?\d+$/;

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}

function canonicalDate(year: number, month: number, day: number): string | null {
    if (month < 1 || month > 12 || day < 1 || day > 31) return null;

    const date = new Date(Date.UTC(year, month - 1, day));
    // Rejects 31-02-2023 and similar rollovers
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }
    return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

export function normalizeDate(raw: unknown): string | null {
    if (raw instanceof Date) {
        if (Number.isNaN(raw.getTime())) return null;
        return canonicalDate(raw.getUTCFullYear(), raw.getUTCMonth() + 1, raw.getUTCDate());
    }
    if (typeof raw !== 'string') return null;

    const text = raw.trim();
    if (text === '') return null;

    const yearFirst = YEAR_FIRST.exec(text);
    if (yearFirst) {
        return canonicalDate(Number(yearFirst[1]), Number(yearFirst[3]), Number(yearFirst[4]));
    }

    const dayFirst = DAY_FIRST.exec(text);
    if (dayFirst) {
        return canonicalDate(Number(dayFirst[4]), Number(dayFirst[3]), Number(dayFirst[1]));
    }

    const isoDateTime = ISO_DATE_TIME.exec(text);
    if (isoDateTime) {
        return canonicalDate(Number(isoDateTime[1]), Number(isoDateTime[2]), Number(isoDateTime[3]));
    }

    return null;
}

export function normalizeText(raw: unknown): string | null {
    let text: string;
    if (typeof raw === 'string') {
        text = raw;
    } else if (typeof raw === 'number' && Number.isFinite(raw)) {
        text = String(raw);
    } else {
        return null;
    }

    const normalized = text.trim().toLowerCase();
    return normalized === '' ? null : normalized;
}

export function normalizeInteger(raw: unknown): number | null {
    if (typeof raw === 'number') {
        return Number.isSafeInteger(raw) ? raw : null;
    }
    if (typeof raw !== 'string') return null;

    const text = raw.trim();
    if (!INTEGER.test(text)) return null;

    const value = Number(text);
    return Number.isSafeInteger(value) ? value : null;
}
