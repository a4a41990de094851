import path from 'path';
import { DEFAULT_OCR_LANGUAGES } from './ocr/tesseract-engine';
import { DEFAULT_DEDUP_WINDOW_MS } from './store/recent-events';

export interface BotConfig {
    discordToken: string;
    dataDir: string;
    uploadDir: string;
    ledgerPath: string;
    vendorMapPath: string;
    ocrLanguages: string[];
    tesseractLangPath?: string;
    dedupWindowMs: number;
}

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
    const raw = env[name]?.trim();
    if (!raw) {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        console.warn(`Ignoring ${name}=${raw}: expected a positive integer, using ${fallback}`);
        return fallback;
    }
    return value;
}

function readList(env: Env, name: string, fallback: string[]): string[] {
    const items = (env[name] ?? '').split(',').map(item => item.trim()).filter(Boolean);
    return items.length > 0 ? items : fallback;
}

export function loadConfig(env: Env = process.env): BotConfig {
    const discordToken = env.DISCORD_TOKEN?.trim();
    if (!discordToken) {
        throw new Error('DISCORD_TOKEN must be set in the environment or .env');
    }

    const dataDir = path.resolve(env.DATA_DIR?.trim() || './data');
    return {
        discordToken,
        dataDir,
        uploadDir: path.join(dataDir, 'uploads'),
        ledgerPath: path.join(dataDir, 'labels.csv'),
        vendorMapPath: env.VENDOR_MAP_PATH?.trim()
            ? path.resolve(env.VENDOR_MAP_PATH.trim())
            : path.join(dataDir, 'vendor_map.csv'),
        ocrLanguages: readList(env, 'OCR_LANGUAGES', DEFAULT_OCR_LANGUAGES),
        tesseractLangPath: env.TESSERACT_LANG_PATH?.trim() || undefined,
        dedupWindowMs: readPositiveInt(env, 'DEDUP_WINDOW_MS', DEFAULT_DEDUP_WINDOW_MS),
    };
}
