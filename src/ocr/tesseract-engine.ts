import fs from 'fs/promises';
import path from 'path';
import Tesseract from 'tesseract.js';
import type { OcrEngine, OcrFailure, OcrOutcome } from '../types';

export const DEFAULT_OCR_LANGUAGES = ['kor+eng', 'eng'];

// The slice of a tesseract.js worker this engine relies on
export interface RecognizerWorker {
    recognize(image: Buffer): Promise<{ data: { text: string } }>;
    terminate(): Promise<unknown>;
}

export type WorkerFactory = (language: string) => Promise<RecognizerWorker>;

export interface TesseractEngineOptions {
    languages?: string[];
    langPath?: string;
    createWorker?: WorkerFactory;
}

// LSTM-only integer models, the variant tesseract.js picks for its default engine mode
const TRAINEDDATA_VARIANT = '4.0.0_best_int';

export interface BundledLanguage {
    code: string;
    data: Buffer;
}

// Each language's traineddata ships in the @tesseract.js-data/<code> npm package.
export function bundledTraineddataPath(code: string): string {
    const manifest = require.resolve(`@tesseract.js-data/${code}/package.json`);
    return path.join(path.dirname(manifest), TRAINEDDATA_VARIANT, `${code}.traineddata.gz`);
}

// 'kor+eng' -> the gzipped traineddata of kor and eng, in that order
export async function loadBundledLanguages(profile: string): Promise<BundledLanguage[]> {
    return Promise.all(profile.split('+').map(async code => ({
        code,
        data: await fs.readFile(bundledTraineddataPath(code)),
    })));
}

// With a langPath, tesseract.js reads `<langPath>/<code>.traineddata.gz` itself;
// otherwise the bundled data is handed over directly and nothing is cached or fetched.
export function tesseractWorkerFactory(langPath?: string): WorkerFactory {
    return async language => {
        const worker = langPath
            ? await Tesseract.createWorker(language, undefined, { langPath })
            : await Tesseract.createWorker(await loadBundledLanguages(language), undefined, { cacheMethod: 'none' });
        await worker.setParameters({ tessedit_pageseg_mode: Tesseract.PSM.SINGLE_BLOCK });
        return worker;
    };
}

/**
 * Tries each language profile in order and returns the first non-blank text.
 * A profile that throws or reads nothing counts as a failure; when every profile
 * fails the outcome carries empty text and the per-profile reasons.
 */
export class TesseractOcrEngine implements OcrEngine {
    private readonly languages: string[];
    private readonly createWorker: WorkerFactory;
    private readonly workers = new Map<string, Promise<RecognizerWorker>>();

    constructor(options: TesseractEngineOptions = {}) {
        this.languages = options.languages && options.languages.length > 0
            ? options.languages
            : DEFAULT_OCR_LANGUAGES;
        this.createWorker = options.createWorker ?? tesseractWorkerFactory(options.langPath);
    }

    private worker(language: string): Promise<RecognizerWorker> {
        let worker = this.workers.get(language);
        if (!worker) {
            worker = this.createWorker(language);
            this.workers.set(language, worker);
            // A worker that failed to start is retried on the next image.
            void worker.catch(() => this.workers.delete(language));
        }
        return worker;
    }

    async recognize(image: Buffer): Promise<OcrOutcome> {
        const failures: OcrFailure[] = [];
        for (const language of this.languages) {
            try {
                const worker = await this.worker(language);
                const { data } = await worker.recognize(image);
                if (data.text.trim() !== '') {
                    return { ok: true, text: data.text, language };
                }
                failures.push({ language, error: 'no text recognized' });
            } catch (error) {
                failures.push({ language, error: error instanceof Error ? error.message : String(error) });
            }
        }
        return { ok: false, text: '', failures };
    }

    async terminate(): Promise<void> {
        const pending = [...this.workers.values()];
        this.workers.clear();
        const results = await Promise.allSettled(pending.map(async worker => (await worker).terminate()));
        for (const result of results) {
            if (result.status === 'rejected') {
                console.warn('Failed to terminate OCR worker:', result.reason);
            }
        }
    }
}
