import { createSlice } from '@reduxjs/toolkit';
import type { PayloadAction } from '@reduxjs/toolkit';
import { v4 as uuidv4 } from 'uuid';

import { initialImportJobsState as initialState } from '@/constants/default';
import type { ImportJob, ImportJobStatus } from '@/types/job';

const importJobSlice = createSlice({
    name: 'importJobs',
    initialState,
    reducers: {
        jobQueued: {
            reducer(state, action: PayloadAction<ImportJob>) {
                state.jobs.push(action.payload);
            },
            prepare(payload: { sourcePath: string | null; total: number; id?: string }) {
                const job: ImportJob = {
                    id: payload.id ?? uuidv4(),
                    batchId: null,
                    sourcePath: payload.sourcePath,
                    createdAt: Date.now(),
                    status: 'queued',
                    processed: 0,
                    total: payload.total,
                    currentFile: null,
                    error: null,
                };
                return { payload: job };
            },
        },
        jobStarted(state, action: PayloadAction<{ id: string; batchId: number }>) {
            const j = state.jobs.find(x => x.id === action.payload.id);
            if (!j) return;
            j.status = 'active';
            j.batchId = action.payload.batchId;
            state.activeId = j.id;
        },
        jobProgress(state, action: PayloadAction<{ id: string; processed: number; currentFile: string }>) {
            const j = state.jobs.find(x => x.id === action.payload.id);
            if (!j) return;
            j.processed = action.payload.processed;
            j.currentFile = action.payload.currentFile;
        },
        jobFinished(state, action: PayloadAction<{ id: string; status: Exclude<ImportJobStatus, 'queued' | 'active'>; error?: string }>) {
            const j = state.jobs.find(x => x.id === action.payload.id);
            if (!j) return;
            j.status = action.payload.status;
            j.error = action.payload.error ?? null;
            j.currentFile = null;
            if (state.activeId === j.id) state.activeId = null;
        },
        // Remove finished jobs; queued/active ones stay
        jobsClearCompleted(state) {
            state.jobs = state.jobs.filter(j => j.status === 'queued' || j.status === 'active');
        },
    },
});

export const { jobQueued, jobStarted, jobProgress, jobFinished, jobsClearCompleted } = importJobSlice.actions;
export default importJobSlice.reducer;
