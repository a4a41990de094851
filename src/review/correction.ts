import { formatDateTime, parseDateTime } from '../parsing/datetime';
import { UNCATEGORIZED } from '../parsing/category';
import type { CorrectionDefaults, CorrectionInput, DraftRecord } from '../types';

export function correctionDefaults(draft: DraftRecord): CorrectionDefaults {
    return {
        category: draft.category,
        amount: draft.amount !== undefined ? String(draft.amount) : '',
        datetime: draft.timestamp ? formatDateTime(draft.timestamp) : '',
    };
}

// Unusable amount or datetime input keeps the draft's previous value for that field.
export function applyCorrection(draft: DraftRecord, input: CorrectionInput): DraftRecord {
    const category = input.category.trim() || UNCATEGORIZED;
    const digits = input.amount.replace(/\D/g, '');
    const amount = digits !== '' ? BigInt(digits) : draft.amount;
    const timestamp = parseDateTime(input.datetime) ?? draft.timestamp;
    return { ...draft, category, amount, timestamp };
}
