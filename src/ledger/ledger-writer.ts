import fs from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { formatDateTime } from '../parsing/datetime';
import type { DraftRecord, LedgerRow } from '../types';
import { WriteLock } from './write-lock';

export const LEDGER_HEADER = ['id', 'filename', 'category', 'amount', 'datetime', 'ocr_text_path'];

export function toLedgerRow(draft: DraftRecord, textPath: string): LedgerRow {
    return [
        draft.id,
        draft.filename,
        draft.category,
        draft.amount !== undefined ? String(draft.amount) : '',
        draft.timestamp ? formatDateTime(draft.timestamp) : '',
        textPath,
    ];
}

// Append-only CSV ledger plus one raw OCR text file per saved draft.
export class LedgerWriter {
    private readonly lock = new WriteLock();

    constructor(
        private readonly dataDir: string,
        readonly ledgerPath: string = path.join(dataDir, 'labels.csv'),
    ) {}

    sidecarPath(draftId: string): string {
        return path.join(this.dataDir, `${draftId}.txt`);
    }

    async ensureLedger(): Promise<boolean> {
        await fs.mkdir(path.dirname(this.ledgerPath), { recursive: true });
        try {
            await fs.writeFile(this.ledgerPath, stringify([LEDGER_HEADER]), { encoding: 'utf-8', flag: 'wx' });
            return true;
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
                return false;
            }
            throw error;
        }
    }

    async persist(draft: DraftRecord): Promise<LedgerRow> {
        const textPath = this.sidecarPath(draft.id);
        await fs.mkdir(this.dataDir, { recursive: true });
        await fs.writeFile(textPath, draft.rawText, 'utf-8');

        const row = toLedgerRow(draft, textPath);
        const line = stringify([row]);
        await this.lock.run(() => fs.appendFile(this.ledgerPath, line, 'utf-8'));
        return row;
    }
}
