import fs from 'fs/promises';
import path from 'path';
import { guessAmount } from '../parsing/amount';
import { CategoryClassifier } from '../parsing/category';
import { guessDateTime, toIsoString } from '../parsing/datetime';
import { LedgerWriter } from '../ledger/ledger-writer';
import { DraftStore } from '../store/draft-store';
import type {
    CorrectionForm,
    CorrectionInput,
    DraftPresenter,
    DraftRecord,
    InboundImage,
    OcrEngine,
    ReviewOutcome,
} from '../types';
import { applyCorrection, correctionDefaults } from './correction';

export type ImagePreparer = (image: Buffer) => Promise<Buffer>;

export interface ReviewServiceDeps {
    store: DraftStore;
    ledger: LedgerWriter;
    ocr: OcrEngine;
    classifier: CategoryClassifier;
    uploadDir: string;
    prepareImage?: ImagePreparer;
}

export function imageExtension(name: string): string {
    return path.extname(name).toLowerCase() || '.jpg';
}

// Draft lifecycle: ingest -> (confirm | openCorrection -> submitCorrection)
export class ReceiptReviewService {
    private readonly prepareImage: ImagePreparer;

    constructor(private readonly deps: ReviewServiceDeps) {
        this.prepareImage = deps.prepareImage ?? (async image => image);
    }

    async recognizeText(image: Buffer): Promise<string> {
        const outcome = await this.deps.ocr.recognize(await this.prepareImage(image));
        if (!outcome.ok) {
            const reasons = outcome.failures.map(f => `${f.language}: ${f.error}`).join('; ');
            console.warn(`OCR produced no text (${reasons || 'no languages tried'})`);
        }
        return outcome.text;
    }

    async ingest(image: InboundImage, presenter: DraftPresenter): Promise<DraftRecord> {
        const { store, classifier, uploadDir } = this.deps;
        const id = store.allocateId();
        const filename = `${id}${imageExtension(image.name)}`;

        await fs.mkdir(uploadDir, { recursive: true });
        await fs.writeFile(path.join(uploadDir, filename), image.data);

        const rawText = await this.recognizeText(image.data);
        const draft = store.create({
            filename,
            originalName: image.name,
            category: classifier.classify(rawText),
            amount: guessAmount(rawText),
            timestamp: guessDateTime(rawText),
            rawText,
        }, id);
        console.log(
            `Draft ${draft.id} created from ${image.name} (category ${draft.category}, `
            + `amount ${draft.amount ?? '?'}, at ${draft.timestamp ? toIsoString(draft.timestamp) : '?'})`,
        );

        await presenter.presentDraft(draft, image);
        return draft;
    }

    async confirm(draftId: string): Promise<ReviewOutcome> {
        const draft = this.deps.store.take(draftId);
        if (!draft) {
            return { status: 'expired', draftId };
        }
        await this.save(draft);
        return { status: 'saved', draft };
    }

    async openCorrection(draftId: string, form: CorrectionForm): Promise<'prompted' | 'expired'> {
        const draft = this.deps.store.get(draftId);
        if (!draft) {
            return 'expired';
        }
        await form.collectCorrections(draftId, correctionDefaults(draft));
        return 'prompted';
    }

    async submitCorrection(draftId: string, input: CorrectionInput): Promise<ReviewOutcome> {
        const draft = this.deps.store.take(draftId);
        if (!draft) {
            return { status: 'expired', draftId };
        }
        const corrected = applyCorrection(draft, input);
        await this.save(corrected);
        return { status: 'saved', draft: corrected };
    }

    private async save(draft: DraftRecord): Promise<void> {
        try {
            await this.deps.ledger.persist(draft);
        } catch (error) {
            this.deps.store.restore(draft);
            throw error;
        }
    }
}
