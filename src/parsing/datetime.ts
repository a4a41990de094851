import type { CalendarDateTime } from '../types';

interface DateRule {
    pattern: RegExp;
    toYear: (digits: string) => number;
}

// Tried in order; the first rule that matches anywhere in the text wins.
export const DATE_RULES: readonly DateRule[] = [
    { pattern: /(\d{4})[.\-/](\d{1,2})[.\-/](\d{1,2})/, toYear: digits => parseInt(digits, 10) },
    { pattern: /(\d{2})[.\-/](\d{1,2})[.\-/](\d{1,2})/, toYear: digits => 2000 + parseInt(digits, 10) },
];

const TIME_PATTERN = /(\d{1,2}):(\d{2})(?::(\d{2}))?/;

const STRICT_DATETIME = /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function pad(value: number, width = 2): string {
    return String(value).padStart(width, '0');
}

export function isValidDateTime(value: CalendarDateTime): boolean {
    const { year, month, day, hour, minute, second } = value;
    if (year < 1 || month < 1 || month > 12 || day < 1) {
        return false;
    }
    if (hour > 23 || minute > 59 || second > 59) {
        return false;
    }
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    const daysInMonth = month === 2 && leap ? 29 : DAYS_IN_MONTH[month - 1];
    return day <= daysInMonth;
}

// Returns the value only if it names a real calendar moment.
export function makeDateTime(value: CalendarDateTime): CalendarDateTime | undefined {
    return isValidDateTime(value) ? value : undefined;
}

export function guessDateTime(text: string): CalendarDateTime | undefined {
    let date: Pick<CalendarDateTime, 'year' | 'month' | 'day'> | undefined;
    for (const rule of DATE_RULES) {
        const match = rule.pattern.exec(text);
        if (match) {
            date = {
                year: rule.toYear(match[1]),
                month: parseInt(match[2], 10),
                day: parseInt(match[3], 10),
            };
            break;
        }
    }
    if (!date) {
        return undefined;
    }

    let time = { hour: 0, minute: 0, second: 0 };
    const timeMatch = TIME_PATTERN.exec(text);
    if (timeMatch) {
        time = {
            hour: parseInt(timeMatch[1], 10),
            minute: parseInt(timeMatch[2], 10),
            second: timeMatch[3] ? parseInt(timeMatch[3], 10) : 0,
        };
    }

    return makeDateTime({ ...date, ...time });
}

// "YYYY-MM-DD HH:MM:SS", the ledger and correction-form format
export function formatDateTime(value: CalendarDateTime): string {
    return `${pad(value.year, 4)}-${pad(value.month)}-${pad(value.day)} `
        + `${pad(value.hour)}:${pad(value.minute)}:${pad(value.second)}`;
}

export function toIsoString(value: CalendarDateTime): string {
    return formatDateTime(value).replace(' ', 'T');
}

export function parseDateTime(input: string): CalendarDateTime | undefined {
    const match = STRICT_DATETIME.exec(input.trim());
    if (!match) {
        return undefined;
    }
    const [, year, month, day, hour, minute, second] = match.map(part => parseInt(part, 10));
    return makeDateTime({ year, month, day, hour, minute, second });
}
