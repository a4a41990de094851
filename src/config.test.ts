import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('applies defaults under DATA_DIR', () => {
        const config = loadConfig({ DISCORD_TOKEN: 'test-token', DATA_DIR: '/srv/receipts' });
        expect(config).toEqual({
            discordToken: 'test-token',
            dataDir: '/srv/receipts',
            uploadDir: path.join('/srv/receipts', 'uploads'),
            ledgerPath: path.join('/srv/receipts', 'labels.csv'),
            vendorMapPath: path.join('/srv/receipts', 'vendor_map.csv'),
            ocrLanguages: ['kor+eng', 'eng'],
            tesseractLangPath: undefined,
            dedupWindowMs: 10_000,
        });
    });

    it('reads overrides', () => {
        const config = loadConfig({
            DISCORD_TOKEN: 'test-token',
            DATA_DIR: '/srv/receipts',
            VENDOR_MAP_PATH: '/etc/vendors.csv',
            OCR_LANGUAGES: 'eng, jpn ,',
            TESSERACT_LANG_PATH: '/opt/tessdata',
            DEDUP_WINDOW_MS: '2500',
        });
        expect(config.vendorMapPath).toBe('/etc/vendors.csv');
        expect(config.ocrLanguages).toEqual(['eng', 'jpn']);
        expect(config.tesseractLangPath).toBe('/opt/tessdata');
        expect(config.dedupWindowMs).toBe(2500);
    });

    it('falls back on an invalid dedup window', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const config = loadConfig({ DISCORD_TOKEN: 'test-token', DEDUP_WINDOW_MS: 'soon' });
        expect(config.dedupWindowMs).toBe(10_000);
        expect(warn).toHaveBeenCalledWith('Ignoring DEDUP_WINDOW_MS=soon: expected a positive integer, using 10000');
    });

    it('requires a token', () => {
        expect(() => loadConfig({ DATA_DIR: '/srv/receipts' })).toThrow('DISCORD_TOKEN must be set');
    });
});
