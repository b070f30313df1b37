import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { MeasurementResult } from '@/types/measurement';
import { mapOrdered, processFile } from './batchLoader';

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('mapOrdered', () => {
    it('delivers results in input order with bounded concurrency', async () => {
        let inFlight = 0;
        let peak = 0;
        const seen: number[] = [];

        const cancelled = await mapOrdered(
            [30, 5, 15, 1],
            2,
            async (ms) => {
                inFlight++;
                peak = Math.max(peak, inFlight);
                await sleep(ms);
                inFlight--;
                return ms;
            },
            (value) => { seen.push(value); }
        );

        expect(cancelled).toBe(false);
        expect(seen).toEqual([30, 5, 15, 1]);
        expect(peak).toBe(2);
    });

    it('stops starting items once the signal fires', async () => {
        const controller = new AbortController();
        const started: number[] = [];
        const seen: number[] = [];

        const cancelled = await mapOrdered(
            [0, 1, 2, 3, 4],
            1,
            async (i) => { started.push(i); return i; },
            (i) => {
                seen.push(i);
                if (i === 1) controller.abort();
            },
            controller.signal
        );

        expect(cancelled).toBe(true);
        expect(started).toEqual([0, 1]);
        expect(seen).toEqual([0, 1]);
    });

    it('handles an empty list', async () => {
        const seen: number[] = [];
        expect(await mapOrdered([], 4, async (x: number) => x, (x) => { seen.push(x); })).toBe(false);
        expect(seen).toEqual([]);
    });
});

describe('processFile', () => {
    let dir = '';

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'analyzer-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    const write = async (name: string, text: string) => {
        const path = join(dir, name);
        await writeFile(path, text, 'utf-8');
        return path;
    };

    it('normalizes every row of a good report', async () => {
        const path = await write('good.csv', 'No,Item,Measured,Design,Upper Tol,Lower Tol\n1,Gap-A,100.01,100,0.05,-0.05\n2,Gap-A,100.09,100,0.05,-0.05\n');
        const outcome = await processFile({ path, size: null }, 7, { headerScanLines: 60 });

        expect(outcome.failures).toEqual([]);
        expect(outcome.sizeBytes).toBeGreaterThan(0);
        expect(outcome.records.map(r => [r.lineNumber, r.result, r.sourceBatchId])).toEqual([
            [2, MeasurementResult.Pass, 7],
            [3, MeasurementResult.Fail, 7],
        ]);
    });

    it('records bad rows and keeps the rest', async () => {
        const path = await write('rows.csv', 'No,Item,Measured,Design,Upper Tol,Lower Tol\n1,Gap-A,abc,100,0.05,-0.05\n2,Gap-A,100,100,0.05,-0.05\n');
        const outcome = await processFile({ path, size: 10 }, 1, { headerScanLines: 60 });

        expect(outcome.sizeBytes).toBe(10);
        expect(outcome.records).toHaveLength(1);
        expect(outcome.failures).toEqual([{
            kind: 'RecordParse',
            level: 'row',
            sourcePath: path,
            lineNumber: 2,
            message: 'measured value "abc" is not a number',
        }]);
    });

    it('turns a malformed report into one file-level failure', async () => {
        const path = await write('broken.csv', 'hello,world\n');
        const outcome = await processFile({ path, size: null }, 1, { headerScanLines: 60 });

        expect(outcome.records).toEqual([]);
        expect(outcome.failures).toEqual([
            { kind: 'MalformedReport', level: 'file', sourcePath: path, message: 'header not found' },
        ]);
    });

    it('turns an unreadable file into an IO failure', async () => {
        const path = join(dir, 'missing.csv');
        const outcome = await processFile({ path, size: null }, 1, { headerScanLines: 60 });

        expect(outcome.records).toEqual([]);
        expect(outcome.failures).toHaveLength(1);
        expect(outcome.failures[0]).toMatchObject({ kind: 'IO', level: 'file', sourcePath: path });
        expect(outcome.failures[0].message.startsWith(`${path}: `)).toBe(true);
    });
});
