import { randomUUID } from 'crypto';
import type { DraftInput, DraftRecord } from '../types';

export type IdGenerator = () => string;

// 128 random bits as 32 hex chars
export const randomDraftId: IdGenerator = () => randomUUID().replace(/-/g, '');

/**
 * Drafts waiting for the user to confirm or correct them.
 *
 * Nothing expires here: a draft lives until it is taken by confirm/correct or the
 * process exits. `take` is synchronous so that, of two handlers racing on one id,
 * exactly one gets the draft.
 */
export class DraftStore {
    private readonly drafts = new Map<string, DraftRecord>();

    constructor(private readonly nextId: IdGenerator = randomDraftId) {}

    allocateId(): string {
        let id = this.nextId();
        while (this.drafts.has(id)) {
            id = this.nextId();
        }
        return id;
    }

    create(input: DraftInput, id: string = this.allocateId()): DraftRecord {
        if (this.drafts.has(id)) {
            throw new Error(`Draft ${id} already exists`);
        }
        const draft: DraftRecord = { ...input, id };
        this.drafts.set(id, draft);
        return draft;
    }

    get(id: string): DraftRecord | undefined {
        return this.drafts.get(id);
    }

    remove(id: string): boolean {
        return this.drafts.delete(id);
    }

    take(id: string): DraftRecord | undefined {
        const draft = this.drafts.get(id);
        if (draft) {
            this.drafts.delete(id);
        }
        return draft;
    }

    // Puts back a draft whose persist failed, unless the id was reused meanwhile.
    restore(draft: DraftRecord): void {
        if (!this.drafts.has(draft.id)) {
            this.drafts.set(draft.id, draft);
        }
    }

    get size(): number {
        return this.drafts.size;
    }

    clear(): void {
        this.drafts.clear();
    }
}
