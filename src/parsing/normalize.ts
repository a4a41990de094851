// Collapse whitespace runs, trim, lowercase. Used before every keyword or pattern match.
export function normalizeText(text: string): string {
    return text.replace(/\s+/g, ' ').trim().toLowerCase();
}
