import { normalizeText } from './normalize';

// 12,345 / 1 234 567 / 12345, optionally followed by 원, krw or ₩.
// The token has to end at a word boundary, either right after the digits or after the marker.
const AMOUNT_PATTERN = /(\d{1,3}(?:[,\s]\d{3})+|\d{4,})(?=\s*(?:원|krw|₩)?(?![\p{L}\p{N}_]))/giu;

// Anything below this is more likely a quantity or a point balance than a price.
const MIN_PLAUSIBLE_AMOUNT = 1000n;

// Digit runs can be barcodes or approval numbers, so amounts stay exact as bigint.
export function findAmountCandidates(text: string): bigint[] {
    const candidates: bigint[] = [];
    for (const match of normalizeText(text).matchAll(AMOUNT_PATTERN)) {
        candidates.push(BigInt(match[1].replace(/\D/g, '')));
    }
    return candidates;
}

function largest(values: bigint[]): bigint {
    return values.reduce((max, value) => (value > max ? value : max));
}

export function guessAmount(text: string): bigint | undefined {
    const candidates = findAmountCandidates(text);
    if (candidates.length === 0) {
        return undefined;
    }
    const plausible = candidates.filter(value => value >= MIN_PLAUSIBLE_AMOUNT);
    return largest(plausible.length > 0 ? plausible : candidates);
}
