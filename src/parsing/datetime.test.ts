import { describe, expect, it } from 'vitest';
import { formatDateTime, guessDateTime, parseDateTime, toIsoString } from './datetime';

function iso(text: string): string | undefined {
    const value = guessDateTime(text);
    return value ? toIsoString(value) : undefined;
}

describe('guessDateTime', () => {
    it('reads a four-digit-year date with seconds', () => {
        expect(guessDateTime('2025-11-13 14:05:30 결제완료')).toEqual({
            year: 2025, month: 11, day: 13, hour: 14, minute: 5, second: 30,
        });
    });

    it('reads a two-digit year as 20YY', () => {
        expect(iso('25.3.2 13:00')).toBe('2025-03-02T13:00:00');
    });

    it('defaults the time to midnight', () => {
        expect(iso('거래일시 2024/02/29')).toBe('2024-02-29T00:00:00');
    });

    it('pairs a time that appears before the date', () => {
        expect(iso('14:05 승인 2025.01.09')).toBe('2025-01-09T14:05:00');
    });

    it('tries the four-digit rule before the two-digit one', () => {
        expect(iso('25-01-02 출력 2024-12-31')).toBe('2024-12-31T00:00:00');
    });

    it('returns undefined for impossible dates and times', () => {
        expect(guessDateTime('2025-13-40')).toBeUndefined();
        expect(guessDateTime('2023/02/29')).toBeUndefined();
        expect(guessDateTime('2025-01-01 25:10')).toBeUndefined();
    });

    it('returns undefined for a time without a date', () => {
        expect(guessDateTime('14:05 승인')).toBeUndefined();
    });
});

describe('parseDateTime', () => {
    it('parses the ledger format', () => {
        const value = parseDateTime(' 2025-03-02 13:00:00 ');
        expect(value && formatDateTime(value)).toBe('2025-03-02 13:00:00');
    });

    it('rejects other shapes and invalid values', () => {
        expect(parseDateTime('2025-03-02')).toBeUndefined();
        expect(parseDateTime('2025-02-30 10:00:00')).toBeUndefined();
        expect(parseDateTime('')).toBeUndefined();
    });
});
