import { createSlice } from '@reduxjs/toolkit';
import type { PayloadAction } from '@reduxjs/toolkit';

import { initialLogState as initialState } from '@/constants/default';
import type { Log } from '@/types/log';

const consoleLogSlice = createSlice({
    name: 'consoleLog',
    initialState,
    reducers: {
        addLog: {
            // oldest entries drop off once `limit` is reached
            reducer(state, action: PayloadAction<{ log: Log; limit: number }>) {
                const { log, limit } = action.payload;
                state.logs.push(log);
                if (limit > 0 && state.logs.length > limit) {
                    state.logs.splice(0, state.logs.length - limit);
                }
            },
            prepare(log: Log, limit = 0) {
                return { payload: { log: { ...log, date: log.date ?? new Date().toISOString() }, limit } };
            },
        },
        clearLogs(state) {
            state.logs = [];
        },
    },
});

export const { addLog, clearLogs } = consoleLogSlice.actions;
export default consoleLogSlice.reducer;
