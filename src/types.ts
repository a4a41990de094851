// src/types.ts

// A zone-less calendar date-time, exactly as printed on the receipt
export interface CalendarDateTime {
    year: number;
    month: number; // 1-12
    day: number;
    hour: number;
    minute: number;
    second: number;
}

// Define the structure of a receipt draft awaiting confirmation
export interface DraftRecord {
    id: string;
    filename: string; // stored image name: <id><ext>
    originalName: string;
    category: string;
    amount?: bigint;
    timestamp?: CalendarDateTime;
    rawText: string;
}

export type DraftInput = Omit<DraftRecord, 'id'>;

// One row of the ledger CSV, in column order
export type LedgerRow = [
    id: string,
    filename: string,
    category: string,
    amount: string,
    datetime: string,
    ocrTextPath: string,
];

export interface VendorPattern {
    pattern: RegExp;
    category: string;
    vendor: string;
}

export interface RejectedVendorRow {
    row: number;
    reason: string;
}

export interface VendorTableLoad {
    patterns: VendorPattern[];
    rejected: RejectedVendorRow[];
}

// Built-in keyword table entry; order in the table is the tie-break order
export interface CategoryRule {
    category: string;
    keywords: string[];
}

export interface OcrFailure {
    language: string;
    error: string;
}

export type OcrOutcome =
    | { ok: true; text: string; language: string }
    | { ok: false; text: ''; failures: OcrFailure[] };

export interface OcrEngine {
    recognize(image: Buffer): Promise<OcrOutcome>;
    terminate(): Promise<void>;
}

// An image attachment as delivered by the chat transport
export interface InboundImage {
    name: string;
    contentType: string;
    url: string;
    data: Buffer;
}

// Values shown in the correction form, already formatted as text
export interface CorrectionDefaults {
    category: string;
    amount: string;
    datetime: string;
}

export type CorrectionInput = CorrectionDefaults;

// Transport capability: show a draft with confirm/correct choices
export interface DraftPresenter {
    presentDraft(draft: DraftRecord, image: InboundImage): Promise<void>;
}

// Transport capability: ask the user for corrected field values
export interface CorrectionForm {
    collectCorrections(draftId: string, defaults: CorrectionDefaults): Promise<void>;
}

export type ReviewOutcome =
    | { status: 'saved'; draft: DraftRecord }
    | { status: 'expired'; draftId: string };
