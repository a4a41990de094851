import { describe, expect, it } from 'vitest';
import { CategoryClassifier, UNCATEGORIZED } from './category';

describe('CategoryClassifier', () => {
    const classifier = new CategoryClassifier();

    it('classifies by built-in keywords', () => {
        expect(classifier.classify('스타벅스 아메리카노')).toBe('카페');
        expect(classifier.classify('GS25 편의점')).toBe('편의점');
    });

    it('returns the uncategorized sentinel when nothing matches', () => {
        expect(classifier.classify('hello world')).toBe(UNCATEGORIZED);
        expect(UNCATEGORIZED).toBe('기타');
    });

    it('counts each keyword once and takes the highest score', () => {
        expect(classifier.score('커피 커피 커피 버거 치킨')).toEqual(new Map([
            ['카페', 1],
            ['식당', 2],
        ]));
        expect(classifier.classify('커피 커피 커피 버거 치킨')).toBe('식당');
    });

    it('breaks ties in favour of the earlier category', () => {
        expect(classifier.classify('치킨 마트')).toBe('식당');
    });

    it('lowercases keywords from custom rules', () => {
        const custom = new CategoryClassifier([], [{ category: 'A', keywords: ['ABC'] }]);
        expect(custom.classify('xx abc')).toBe('A');
    });

    it('lets vendor patterns override keyword scoring', () => {
        const withVendors = new CategoryClassifier([
            { pattern: /스타벅스/i, category: '회사경비', vendor: 'Starbucks' },
        ]);
        expect(withVendors.classify('스타벅스 아메리카노')).toBe('회사경비');
    });

    it('uses the first vendor pattern that matches the normalized text', () => {
        const withVendors = new CategoryClassifier([
            { pattern: /gs25 편의점/i, category: '간식', vendor: 'GS25' },
            { pattern: /gs25/i, category: '생필품', vendor: 'GS25 any' },
        ]);
        expect(withVendors.matchVendor('GS25\n   편의점')?.vendor).toBe('GS25');
        expect(withVendors.classify('GS25\n   편의점')).toBe('간식');
    });
});
