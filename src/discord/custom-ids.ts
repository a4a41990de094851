export type ReviewAction = 'confirm' | 'edit' | 'correct';

const PREFIX = 'receipt';
const ACTIONS: readonly ReviewAction[] = ['confirm', 'edit', 'correct'];

export interface ReviewCustomId {
    action: ReviewAction;
    draftId: string;
}

function isReviewAction(value: string): value is ReviewAction {
    return ACTIONS.some(action => action === value);
}

export function encodeCustomId(action: ReviewAction, draftId: string): string {
    return `${PREFIX}:${action}:${draftId}`;
}

// Returns undefined for component ids that were not issued by this bot.
export function decodeCustomId(customId: string): ReviewCustomId | undefined {
    const [prefix, action, draftId, ...rest] = customId.split(':');
    if (prefix !== PREFIX || !action || !draftId || rest.length > 0 || !isReviewAction(action)) {
        return undefined;
    }
    return { action, draftId };
}
