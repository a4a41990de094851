// src/index.ts
import dotenv from 'dotenv';
import { loadConfig } from './config';
import { createBot } from './discord/bot';
import { LedgerWriter } from './ledger/ledger-writer';
import { prepareImageForOcr } from './ocr/image-preparer';
import { TesseractOcrEngine } from './ocr/tesseract-engine';
import { CategoryClassifier } from './parsing/category';
import { loadVendorTable } from './parsing/vendor-map';
import { ReceiptReviewService } from './review/review-service';
import { DraftStore } from './store/draft-store';
import { RecentEventFilter } from './store/recent-events';

dotenv.config();

async function main(): Promise<void> {
    // --- Configuration ---
    const config = loadConfig();

    // --- Ledger Setup ---
    const ledger = new LedgerWriter(config.dataDir, config.ledgerPath);
    if (await ledger.ensureLedger()) {
        console.log(`Created ledger at ${ledger.ledgerPath}`);
    }

    // --- Vendor Map ---
    const vendorTable = await loadVendorTable(config.vendorMapPath);
    for (const rejected of vendorTable.rejected) {
        console.warn(`[vendor_map] skipped row ${rejected.row}: ${rejected.reason}`);
    }
    console.log(`[vendor_map] loaded patterns: ${vendorTable.patterns.length}`);

    // --- Review Pipeline ---
    const store = new DraftStore();
    const recentEvents = new RecentEventFilter(config.dedupWindowMs);
    const ocr = new TesseractOcrEngine({
        languages: config.ocrLanguages,
        langPath: config.tesseractLangPath,
    });
    const review = new ReceiptReviewService({
        store,
        ledger,
        ocr,
        classifier: new CategoryClassifier(vendorTable.patterns),
        uploadDir: config.uploadDir,
        prepareImage: prepareImageForOcr,
    });

    const client = createBot({ review, recentEvents });

    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log(`Received ${signal}, shutting down (${store.size} unconfirmed drafts dropped).`);
        await client.destroy();
        await ocr.terminate();
        store.clear();
        recentEvents.clear();
    };
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
            shutdown(signal).catch(error => {
                console.error('Error during shutdown:', error);
                process.exitCode = 1;
            });
        });
    }

    await client.login(config.discordToken);
}

main().catch(error => {
    console.error('Failed to start the bot:', error);
    process.exit(1);
});
