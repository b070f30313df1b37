import { configureStore } from '@reduxjs/toolkit';
import sessionReducer from './slices/sessionSlice';
import importJobsReducer from './slices/importJobSlice';
import loggingReducer from './slices/logSlice';

/**
 * One store per analyzer session; nothing here is process-wide.
 */
export function createSessionStore() {
    return configureStore({
        reducer: {
            session: sessionReducer,
            importJobs: importJobsReducer,
            log: loggingReducer,
        },
        // Records are plain data but the series get large; the dev checks walk every one of them
        middleware: (gDM) => gDM({
            serializableCheck: false,
            immutableCheck: false,
        }),
    });
}

// Infer the `RootState` and `AppDispatch` types from the store itself
export type SessionStore = ReturnType<typeof createSessionStore>;
export type RootState = ReturnType<SessionStore['getState']>;
export type AppDispatch = SessionStore['dispatch'];
