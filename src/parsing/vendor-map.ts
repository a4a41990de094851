import fs from 'fs/promises';
import { parse } from 'csv-parse/sync';
import type { RejectedVendorRow, VendorPattern, VendorTableLoad } from '../types';

const REQUIRED_COLUMNS = ['vendor', 'category', 'alias_regex'] as const;

type VendorRow = Record<(typeof REQUIRED_COLUMNS)[number], string>;

function isVendorRow(record: unknown): record is VendorRow {
    if (typeof record !== 'object' || record === null) {
        return false;
    }
    const fields: Record<string, unknown> = { ...record };
    return REQUIRED_COLUMNS.every(column => typeof fields[column] === 'string' && fields[column] !== '');
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

interface ParsedLine {
    record: unknown;
    line: number;
}

// csv-parse with `info: true` yields `{ info: { lines }, record }` per record
function toParsedLine(value: unknown): ParsedLine | undefined {
    if (typeof value !== 'object' || value === null || !('record' in value) || !('info' in value)) {
        return undefined;
    }
    const info = value.info;
    const line = typeof info === 'object' && info !== null && 'lines' in info && typeof info.lines === 'number'
        ? info.lines
        : 0;
    return { record: value.record, line };
}

// Parses vendor_map.csv content. Bad rows are reported, never fatal.
export function parseVendorTable(content: string): VendorTableLoad {
    const patterns: VendorPattern[] = [];
    const rejected: RejectedVendorRow[] = [];

    const parsed: unknown[] = parse(content, {
        columns: true,
        bom: true,
        info: true,
        skip_empty_lines: true,
        relax_column_count: true,
        relax_quotes: true,
        skip_records_with_error: true,
        trim: true,
        on_skip: (error) => {
            const line = typeof error?.lines === 'number' ? error.lines : 0;
            rejected.push({ row: line, reason: `unreadable CSV row: ${error?.message ?? 'unknown error'}` });
            return undefined;
        },
    });

    for (const entry of parsed) {
        const line = toParsedLine(entry);
        if (!line) {
            continue;
        }
        const { record, line: row } = line;
        if (!isVendorRow(record)) {
            rejected.push({ row, reason: `missing one of ${REQUIRED_COLUMNS.join(', ')}` });
            continue;
        }
        try {
            patterns.push({
                pattern: new RegExp(record.alias_regex, 'i'),
                category: record.category,
                vendor: record.vendor,
            });
        } catch (error) {
            rejected.push({ row, reason: `invalid alias_regex ${JSON.stringify(record.alias_regex)}: ${describeError(error)}` });
        }
    }

    rejected.sort((a, b) => a.row - b.row);
    return { patterns, rejected };
}

export async function loadVendorTable(filePath: string): Promise<VendorTableLoad> {
    let content: string;
    try {
        content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return { patterns: [], rejected: [] };
        }
        throw error;
    }
    return parseVendorTable(content);
}
