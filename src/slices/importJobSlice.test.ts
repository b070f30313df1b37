import { describe, expect, it } from 'vitest';
import { createSessionStore } from '@/store';
import { jobFinished, jobProgress, jobQueued, jobsClearCompleted, jobStarted } from './importJobSlice';

describe('importJobSlice', () => {
    it('moves a job from queued to done', () => {
        const store = createSessionStore();
        const { payload: job } = store.dispatch(jobQueued({ sourcePath: '/data', total: 2 }));
        expect(job.id).toMatch(/^[0-9a-f-]{36}$/);
        expect(job.status).toBe('queued');

        store.dispatch(jobStarted({ id: job.id, batchId: 4 }));
        expect(store.getState().importJobs.activeId).toBe(job.id);

        store.dispatch(jobProgress({ id: job.id, processed: 1, currentFile: '/data/a.csv' }));
        store.dispatch(jobFinished({ id: job.id, status: 'done' }));

        const [stored] = store.getState().importJobs.jobs;
        expect(stored).toMatchObject({ batchId: 4, processed: 1, total: 2, status: 'done', currentFile: null, error: null });
        expect(store.getState().importJobs.activeId).toBeNull();
    });

    it('clears finished jobs only', () => {
        const store = createSessionStore();
        const { payload: a } = store.dispatch(jobQueued({ sourcePath: null, total: 1 }));
        store.dispatch(jobQueued({ sourcePath: null, total: 1, id: 'pending' }));
        store.dispatch(jobFinished({ id: a.id, status: 'error', error: 'boom' }));
        store.dispatch(jobsClearCompleted());
        expect(store.getState().importJobs.jobs.map(j => j.id)).toEqual(['pending']);
    });
});
