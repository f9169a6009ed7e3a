import { describe, it, expect } from 'vitest';
import { derive, deriveFeatures, parsePublishedDate } from '../builder/features.js';
import { MalformedDateError } from '../utils/errors.js';
import type { ArticleRecord } from '../types/index.js';

const base: ArticleRecord = {
    arxiv_id: '2101.00001v1',
    updated_date: '2021-03-18T12:30:00Z',
    published_date: '2021-03-15T00:00:00Z',
    title: 'Entanglement Witnesses for Toy Qubit Chains',
    summary: 'Fixture abstract.',
    authors: ['Ada Example', 'Bo Placeholder'],
    comment: '12 pages, 3 figures',
    categories: ['quant-ph'],
};

describe('Feature Deriver', () => {
    describe('parsePublishedDate', () => {
        it('should split an ISO timestamp by position', () => {
            expect(parsePublishedDate('2021-03-15T00:00:00Z')).toEqual({ year: 2021, month: 3, day: 15 });
        });

        it('should accept a bare date', () => {
            expect(parsePublishedDate('1999-12-01')).toEqual({ year: 1999, month: 12, day: 1 });
        });

        it('should reject strings shorter than a date', () => {
            expect(() => parsePublishedDate('2021-03')).toThrow(MalformedDateError);
        });

        it('should reject non-numeric parts', () => {
            expect(() => parsePublishedDate('2021-March-15')).toThrow('Malformed published date: "2021-March-15"');
        });
    });

    describe('deriveFeatures', () => {
        it('should add all derived columns', () => {
            expect(deriveFeatures(base)).toEqual({
                ...base,
                pages: 12,
                figures: 3,
                num_of_authors: 2,
                title_length: 6,
                year_of_publishing: 2021,
                month_of_publishing: 3,
                date_of_publishing: 15,
            });
        });

        it('should leave counts null without a comment', () => {
            const row = deriveFeatures({ ...base, comment: null });
            expect(row.pages).toBeNull();
            expect(row.figures).toBeNull();
        });

        it('should count zero authors', () => {
            expect(deriveFeatures({ ...base, authors: [] }).num_of_authors).toBe(0);
        });

        it('should count title words across line breaks', () => {
            expect(deriveFeatures({ ...base, title: 'Toy Qubit\n  Chains' }).title_length).toBe(3);
        });

        it('should null the date columns for a malformed date instead of throwing', () => {
            const row = deriveFeatures({ ...base, published_date: '2021' });
            expect(row.year_of_publishing).toBeNull();
            expect(row.month_of_publishing).toBeNull();
            expect(row.date_of_publishing).toBeNull();
            expect(row.pages).toBe(12);
        });

        it('should not mutate the input record', () => {
            const record = { ...base };
            deriveFeatures(record);
            expect(record).toEqual(base);
        });
    });

    describe('derive', () => {
        it('should preserve record order', () => {
            const rows = derive([{ ...base, arxiv_id: 'b' }, { ...base, arxiv_id: 'a' }]);
            expect(rows.map((r) => r.arxiv_id)).toEqual(['b', 'a']);
        });
    });
});
