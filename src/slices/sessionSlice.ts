import { createSelector, createSlice, weakMapMemoize } from '@reduxjs/toolkit';
import type { PayloadAction } from '@reduxjs/toolkit';

import { initialSessionState as initialState } from '@/constants/default';
import type { ImportBatch, ItemSeries, ItemStatistics, MeasurementRecord } from '@/types/measurement';
import { naturalCompare } from '@/utils/helper';
import { computeStatistics } from '@/utils/statistics';

/**
 * Accumulation layer: item name → series, append-only across batches.
 * Records are frozen by Immer once they land here.
 */
export interface SessionState {
    series: Record<string, ItemSeries>;
    batches: ImportBatch[];             // registration order
    nextBatchId: number;                // batch ids restart at 1 after a reset
    generation: number;                 // bumped by every reset
}

/** Actions stamped with an older generation were started before a reset and are dropped. */
const isStale = (state: SessionState, generation: number | undefined) =>
    generation !== undefined && generation !== state.generation;

function registerBatch(state: SessionState, batch: ImportBatch) {
    if (state.batches.some(b => b.batchId === batch.batchId)) return;
    state.batches.push(batch);
    state.nextBatchId = Math.max(state.nextBatchId, batch.batchId + 1);
}

const sessionSlice = createSlice({
    name: 'session',
    initialState,
    reducers: {
        batchRegistered: {
            reducer(state, action: PayloadAction<{ batch: ImportBatch; generation?: number }>) {
                if (isStale(state, action.payload.generation)) return;
                registerBatch(state, action.payload.batch);
            },
            prepare(batch: ImportBatch, generation?: number) {
                return { payload: { batch, generation } };
            },
        },
        // One dispatch per file → readers never see half a file
        recordsMerged: {
            reducer(
                state,
                action: PayloadAction<{ batch: ImportBatch; records: MeasurementRecord[]; generation?: number }>
            ) {
                const { batch, records, generation } = action.payload;
                if (isStale(state, generation)) return;
                registerBatch(state, batch);
                for (const record of records) {
                    const series = state.series[record.itemName];
                    if (series) series.records.push(record);
                    else state.series[record.itemName] = { itemName: record.itemName, records: [record] };
                }
            },
            prepare(batch: ImportBatch, records: MeasurementRecord[], generation?: number) {
                return { payload: { batch, records: records.map(r => Object.freeze({ ...r })), generation } };
            },
        },
        sessionReset(state) {
            return { ...initialState, generation: state.generation + 1 };
        },
    },
});

export const { batchRegistered, recordsMerged, sessionReset } = sessionSlice.actions;
export default sessionSlice.reducer;

////////////////////////////////////////////////////////////////////////////////
// NOTE: Selectors
////////////////////////////////////////////////////////////////////////////////

type WithSession = { session: SessionState };

export const selectSeriesMap = (state: WithSession) => state.session.series;
export const selectBatches = (state: WithSession) => state.session.batches;

export const selectSeries = (state: WithSession, itemName: string): ItemSeries | undefined =>
    Object.prototype.hasOwnProperty.call(state.session.series, itemName)
        ? state.session.series[itemName]
        : undefined;

export const selectItemNames = createSelector(
    [selectSeriesMap],
    (series) => Object.keys(series).sort(naturalCompare)
);

/**
 * Memoized per series object. A merge that touches an item gives its series
 * a new identity, so only that item is recomputed on the next read.
 */
export const statisticsFor = weakMapMemoize(
    (series: ItemSeries, minSamples: number): ItemStatistics => computeStatistics(series, { minSamples })
);

export const selectItemStatistics = (state: WithSession, itemName: string, minSamples: number): ItemStatistics | null => {
    const series = selectSeries(state, itemName);
    return series ? statisticsFor(series, minSamples) : null;
};

export const selectAllStatistics = createSelector(
    [selectSeriesMap, selectItemNames, (_: WithSession, minSamples: number) => minSamples],
    (series, names, minSamples) => names.map(name => statisticsFor(series[name], minSamples))
);

export const selectRecordCount = createSelector(
    [selectSeriesMap],
    (series) => Object.values(series).reduce((n, s) => n + s.records.length, 0)
);

export const selectSourcePaths = createSelector(
    [selectSeriesMap],
    (series) => {
        const paths = new Set<string>();
        for (const s of Object.values(series)) for (const r of s.records) paths.add(r.sourcePath);
        return paths;
    }
);
