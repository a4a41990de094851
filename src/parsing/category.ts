import type { CategoryRule, VendorPattern } from '../types';
import { normalizeText } from './normalize';
import categoryRules from './category-rules.json';

export const UNCATEGORIZED = '기타';

export const DEFAULT_CATEGORY_RULES: readonly CategoryRule[] = categoryRules;

// Vendor patterns are checked first, in load order; keyword scoring only runs when none match.
export class CategoryClassifier {
    private readonly rules: readonly CategoryRule[];

    constructor(
        private readonly vendorPatterns: readonly VendorPattern[] = [],
        rules: readonly CategoryRule[] = DEFAULT_CATEGORY_RULES,
    ) {
        this.rules = rules.map(rule => ({
            category: rule.category,
            keywords: [...new Set(rule.keywords.map(keyword => keyword.toLowerCase()))],
        }));
    }

    matchVendor(text: string): VendorPattern | undefined {
        const normalized = normalizeText(text);
        return this.vendorPatterns.find(vendor => vendor.pattern.test(normalized));
    }

    score(text: string): Map<string, number> {
        const normalized = normalizeText(text);
        const scores = new Map<string, number>();
        for (const rule of this.rules) {
            const hits = rule.keywords.filter(keyword => normalized.includes(keyword)).length;
            if (hits > 0) {
                scores.set(rule.category, hits);
            }
        }
        return scores;
    }

    classify(text: string): string {
        const vendor = this.matchVendor(text);
        if (vendor) {
            return vendor.category;
        }

        let best = UNCATEGORIZED;
        let bestScore = 0;
        // Strictly greater: on a tie the earlier rule keeps the lead.
        for (const [category, score] of this.score(text)) {
            if (score > bestScore) {
                best = category;
                bestScore = score;
            }
        }
        return best;
    }
}
