export type ImportJobStatus = 'queued' | 'active' | 'done' | 'cancelled' | 'error';

export interface ImportJob {
    id: string;
    batchId: number | null;
    sourcePath: string | null;
    createdAt: number;
    status: ImportJobStatus;
    processed: number;
    total: number;
    currentFile: string | null;
    error: string | null;
}

export interface ImportJobsState {
    jobs: ImportJob[];
    activeId: string | null;
}
