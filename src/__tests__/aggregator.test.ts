import { describe, it, expect } from 'vitest';
import { aggregate, dedupeById } from '../builder/aggregator.js';
import { ArxivSource } from '../sources/arxiv.js';
import { TransportError } from '../utils/errors.js';
import type { ArticleRecord } from '../types/index.js';
import { FakeTransport, atomFeed, searchQueryOf } from './helpers.js';

function record(arxivId: string, title: string): ArticleRecord {
    return {
        arxiv_id: arxivId,
        updated_date: '2021-01-01T00:00:00Z',
        published_date: '2021-01-01T00:00:00Z',
        title,
        summary: '',
        authors: [],
        comment: null,
        categories: [],
    };
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('Aggregator', () => {
    describe('dedupeById', () => {
        it('should keep the first occurrence of each id', () => {
            const unique = dedupeById([record('a', 'first'), record('b', 'b'), record('a', 'second')]);
            expect(unique).toEqual([record('a', 'first'), record('b', 'b')]);
        });
    });

    describe('aggregate', () => {
        it('should fetch the full cross product, not pairs', async () => {
            const transport = new FakeTransport(() => atomFeed([]));
            const source = new ArxivSource(transport);

            await aggregate(source, ['a', 'b'], ['cat1', 'cat2'], { verbose: false });

            expect(transport.urls.map(searchQueryOf)).toEqual([
                'ti:a AND cat:cat1',
                'ti:a AND cat:cat2',
                'ti:b AND cat:cat1',
                'ti:b AND cat:cat2',
            ]);
        });

        it('should accept a single query and a single category', async () => {
            const transport = new FakeTransport(() => atomFeed([]));

            await aggregate(new ArxivSource(transport), '', 'quant-ph', { verbose: false });

            expect(transport.urls.map(searchQueryOf)).toEqual(['cat:quant-ph']);
        });

        it('should keep the record from the first pair when ids collide', async () => {
            const transport = new FakeTransport((url) => {
                const query = searchQueryOf(url);
                if (query === 'ti:first AND cat:quant-ph') {
                    return atomFeed([{ id: '2101.00001', title: 'From first' }, { id: '2101.00002', title: 'Only first' }]);
                }
                return atomFeed([{ id: '2101.00001', title: 'From second' }, { id: '2101.00003', title: 'Only second' }]);
            });

            const { records } = await aggregate(new ArxivSource(transport), ['first', 'second'], 'quant-ph', {
                verbose: false,
            });

            expect(records.map((r) => [r.arxiv_id, r.title])).toEqual([
                ['2101.00001', 'From first'],
                ['2101.00002', 'Only first'],
                ['2101.00003', 'Only second'],
            ]);
        });

        it('should keep enumeration order when parallel fetches finish out of order', async () => {
            const transport = new FakeTransport(async (url) => {
                const query = searchQueryOf(url);
                if (query === 'ti:slow AND cat:quant-ph') {
                    await sleep(30);
                    return atomFeed([{ id: 'dup', title: 'slow' }]);
                }
                return atomFeed([{ id: 'dup', title: 'fast' }]);
            });

            const { records } = await aggregate(new ArxivSource(transport), ['slow', 'fast'], 'quant-ph', {
                verbose: false,
                concurrency: 2,
            });

            expect(records).toHaveLength(1);
            expect(records[0]?.title).toBe('slow');
        });

        it.each([NaN, 0, -3, 1.5])('should still fetch every pair when concurrency is %s', async (concurrency) => {
            const transport = new FakeTransport((url) =>
                atomFeed([{ id: searchQueryOf(url).startsWith('ti:a ') ? '2101.00001' : '2101.00002', title: 't' }])
            );

            const { records } = await aggregate(new ArxivSource(transport), ['a', 'b'], 'quant-ph', {
                verbose: false,
                concurrency,
            });

            expect(transport.urls.map(searchQueryOf)).toEqual(['ti:a AND cat:quant-ph', 'ti:b AND cat:quant-ph']);
            expect(records.map((r) => r.arxiv_id)).toEqual(['2101.00001', '2101.00002']);
        });

        it('should be stable across repeated runs over the same responses', async () => {
            const transport = new FakeTransport(() =>
                atomFeed([{ id: 'x1', title: 'x' }, { id: 'x2', title: 'y' }])
            );
            const source = new ArxivSource(transport);

            const first = await aggregate(source, ['a', 'b'], ['c1', 'c2'], { verbose: false });
            const second = await aggregate(source, ['a', 'b'], ['c1', 'c2'], { verbose: false });

            expect(first.records.map((r) => r.arxiv_id)).toEqual(['x1', 'x2']);
            expect(second.records.map((r) => r.arxiv_id)).toEqual(['x1', 'x2']);
        });

        it('should abort on a transport failure by default', async () => {
            const transport = new FakeTransport((url) => {
                throw new TransportError('HTTP 503: Service Unavailable', url, 503);
            });

            await expect(
                aggregate(new ArxivSource(transport), ['a', 'b'], 'quant-ph', { verbose: false })
            ).rejects.toThrow('HTTP 503: Service Unavailable');
            expect(transport.urls).toHaveLength(1);
        });

        it('should record failures and continue when failFast is off', async () => {
            const transport = new FakeTransport((url) => {
                if (searchQueryOf(url) === 'ti:broken AND cat:quant-ph') {
                    throw new TransportError('HTTP 500: Internal Server Error', url, 500);
                }
                return atomFeed([{ id: '2101.00009', title: 'ok' }]);
            });

            const { records, failures } = await aggregate(
                new ArxivSource(transport),
                ['broken', 'fine'],
                'quant-ph',
                { verbose: false, failFast: false }
            );

            expect(records.map((r) => r.arxiv_id)).toEqual(['2101.00009']);
            expect(failures).toHaveLength(1);
            expect(failures[0]?.query).toBe('broken');
            expect(failures[0]?.category).toBe('quant-ph');
            expect(failures[0]?.error.status).toBe(500);
        });
    });
});
