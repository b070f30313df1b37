import { describe, expect, it } from 'vitest';
import { createSessionStore } from '@/store';
import type { ImportBatch } from '@/types/measurement';
import { makeRecord } from '@/utils/testing';
import {
    batchRegistered,
    recordsMerged,
    selectItemNames,
    selectItemStatistics,
    selectRecordCount,
    selectSeries,
    sessionReset,
} from './sessionSlice';

const batch = (batchId: number): ImportBatch => ({ batchId, sourcePath: null, fileCount: 1, importedAt: 0 });

const B1 = [makeRecord(98), makeRecord(101, { itemName: 'Gap-B' }), makeRecord(103)];
const B2 = [makeRecord(99), makeRecord(97, { itemName: 'Gap-B' }), makeRecord(106)];

describe('sessionSlice', () => {
    it('appends records per item in arrival order', () => {
        const store = createSessionStore();
        store.dispatch(recordsMerged(batch(1), B1));
        store.dispatch(recordsMerged(batch(2), B2));

        const gapA = selectSeries(store.getState(), 'Gap-A');
        expect(gapA?.records.map(r => r.measuredValue)).toEqual([98, 103, 99, 106]);
        expect(selectItemNames(store.getState())).toEqual(['Gap-A', 'Gap-B']);
        expect(selectRecordCount(store.getState())).toBe(6);
        expect(store.getState().session.batches.map(b => b.batchId)).toEqual([1, 2]);
        expect(store.getState().session.nextBatchId).toBe(3);
    });

    it('freezes merged records', () => {
        const store = createSessionStore();
        store.dispatch(recordsMerged(batch(1), [makeRecord(100)]));
        const [record] = selectSeries(store.getState(), 'Gap-A')?.records ?? [];
        expect(Object.isFrozen(record)).toBe(true);
    });

    it('gives the same statistics whichever batch merges first', () => {
        const ab = createSessionStore();
        ab.dispatch(recordsMerged(batch(1), B1));
        ab.dispatch(recordsMerged(batch(2), B2));

        const ba = createSessionStore();
        ba.dispatch(recordsMerged(batch(2), B2));
        ba.dispatch(recordsMerged(batch(1), B1));

        for (const item of ['Gap-A', 'Gap-B']) {
            const x = selectItemStatistics(ab.getState(), item, 30);
            const y = selectItemStatistics(ba.getState(), item, 30);
            expect(y?.sampleCount).toBe(x?.sampleCount);
            expect(y?.ngCount).toBe(x?.ngCount);
            expect(y?.mean).toBeCloseTo(x?.mean ?? NaN, 12);
            expect(y?.stdDev).toBeCloseTo(x?.stdDev ?? NaN, 12);
        }
    });

    it('recomputes statistics only for items a merge touched', () => {
        const store = createSessionStore();
        store.dispatch(recordsMerged(batch(1), B1));
        const before = {
            a: selectItemStatistics(store.getState(), 'Gap-A', 30),
            b: selectItemStatistics(store.getState(), 'Gap-B', 30),
        };
        store.dispatch(recordsMerged(batch(2), [makeRecord(100)]));

        expect(selectItemStatistics(store.getState(), 'Gap-B', 30)).toBe(before.b);
        const after = selectItemStatistics(store.getState(), 'Gap-A', 30);
        expect(after).not.toBe(before.a);
        expect(after?.sampleCount).toBe(3);
    });

    it('keeps registered batches and returns null for unknown items', () => {
        const store = createSessionStore();
        store.dispatch(batchRegistered(batch(1)));
        store.dispatch(batchRegistered(batch(1)));
        expect(store.getState().session.batches).toHaveLength(1);
        expect(selectItemStatistics(store.getState(), 'toString', 30)).toBeNull();
    });

    it('resets series, batches and batch ids', () => {
        const store = createSessionStore();
        store.dispatch(recordsMerged(batch(1), B1));
        store.dispatch(sessionReset());
        expect(store.getState().session).toEqual({ series: {}, batches: [], nextBatchId: 1, generation: 1 });
    });

    it('drops merges stamped with a generation from before the reset', () => {
        const store = createSessionStore();
        store.dispatch(batchRegistered(batch(1), 0));
        store.dispatch(sessionReset());

        store.dispatch(recordsMerged(batch(1), B1, 0));
        store.dispatch(batchRegistered(batch(2), 0));
        expect(store.getState().session.batches).toEqual([]);
        expect(selectRecordCount(store.getState())).toBe(0);

        store.dispatch(recordsMerged(batch(1), B2, 1));
        expect(selectRecordCount(store.getState())).toBe(3);
        expect(store.getState().session.batches.map(b => b.batchId)).toEqual([1]);
    });
});
