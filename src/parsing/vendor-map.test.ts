import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { loadVendorTable, parseVendorTable } from './vendor-map';

const VENDOR_CSV = [
    'vendor,category,alias_regex',
    'Starbucks,카페,스타벅스|starbucks',
    'Broken,기타,([unclosed',
    'NoRegex,기타,',
    'Emart,마트,이마트|e-?mart',
].join('\n');

describe('parseVendorTable', () => {
    it('keeps valid rows in file order and reports the rest', () => {
        const { patterns, rejected } = parseVendorTable(VENDOR_CSV);

        expect(patterns.map(p => [p.vendor, p.category])).toEqual([
            ['Starbucks', '카페'],
            ['Emart', '마트'],
        ]);
        expect(rejected.map(r => r.row)).toEqual([3, 4]);
        expect(rejected[0].reason).toMatch(/^invalid alias_regex/);
        expect(rejected[1].reason).toMatch(/^missing one of/);
    });

    it('compiles patterns case-insensitively', () => {
        const { patterns } = parseVendorTable(VENDOR_CSV);
        expect(patterns[0].pattern.test('STARBUCKS COFFEE')).toBe(true);
        expect(patterns[1].pattern.test('E-MART 성수')).toBe(true);
    });
});

describe('parseVendorTable with damaged CSV', () => {
    it('keeps a row with a stray quote inside a field', () => {
        const { patterns, rejected } = parseVendorTable(
            'vendor,category,alias_regex\nStarbucks,카페,스타벅스\nOdd,기타,a"b\nGS25,편의점,gs25\n',
        );

        expect(patterns.map(p => p.vendor)).toEqual(['Starbucks', 'Odd', 'GS25']);
        expect(patterns[1].pattern.source).toBe('a"b');
        expect(rejected).toEqual([]);
    });

    it('reports an unclosed quote instead of throwing', () => {
        const content = 'vendor,category,alias_regex\nStarbucks,카페,스타벅스\nEmart,마트,이마트\nBad,기타,"gs(\nGS25,편의점,gs25\n';

        const { patterns, rejected } = parseVendorTable(content);

        // The open quote swallows the rest of the file, as any CSV reader would
        expect(patterns.map(p => p.vendor)).toEqual(['Starbucks', 'Emart']);
        expect(rejected).toHaveLength(1);
        expect(rejected[0].reason).toMatch(/^unreadable CSV row: Quote Not Closed/);
    });
});

describe('loadVendorTable', () => {
    let dir: string | undefined;

    afterEach(async () => {
        if (dir) {
            await fs.rm(dir, { recursive: true, force: true });
            dir = undefined;
        }
    });

    it('returns an empty table when the file is absent', async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vendor-map-'));
        await expect(loadVendorTable(path.join(dir, 'vendor_map.csv'))).resolves.toEqual({ patterns: [], rejected: [] });
    });

    it('reads the table from disk', async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vendor-map-'));
        const file = path.join(dir, 'vendor_map.csv');
        await fs.writeFile(file, VENDOR_CSV, 'utf-8');

        const table = await loadVendorTable(file);
        expect(table.patterns).toHaveLength(2);
        expect(table.rejected).toHaveLength(2);
    });
});
