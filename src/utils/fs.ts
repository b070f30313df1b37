import type { Dirent } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import { join as joinPath, resolve } from 'node:path';

import { DELIMITED_EXTENSIONS, PDF_EXTENSIONS } from '@/constants';
import { IOFailure } from './errors';
import { naturalCompare } from './helper';
import type { DuplicatePolicy } from '@/types/ingest';

export interface DirEntry {
    path: string;
    name: string;
    size: number | null;                // null when stat failed
}

/**
 * List the regular files directly inside `root` (no recursion).
 * A missing or unreadable folder is fatal for the caller → `IOFailure`.
 */
export async function listFiles(root: string): Promise<DirEntry[]> {
    const absRoot = norm(resolve(root));
    let entries: Dirent[];
    try {
        entries = await readdir(absRoot, { withFileTypes: true });
    } catch (err: unknown) {
        throw new IOFailure(absRoot, err);
    }

    const out: DirEntry[] = [];
    for (const e of entries) {
        if (!e.isFile()) continue;
        const path = norm(joinPath(absRoot, e.name));
        try {
            const info = await stat(path);
            out.push({ path, name: e.name, size: info.size });
        } catch (err: unknown) {
            // Vanished between readdir and stat; the loader reports it when it tries to read
            console.debug('[fs] stat failed, listing without size', path, err);
            out.push({ path, name: e.name, size: null });
        }
    }
    return out.sort((a, b) => naturalCompare(a.name, b.name));
}

/** Read a whole file; any failure surfaces as `IOFailure` for that path. */
export async function readFileBytes(path: string): Promise<Uint8Array> {
    try {
        return await readFile(path);
    } catch (err: unknown) {
        throw new IOFailure(path, err);
    }
}

/** Report files in a folder, with the same-name csv/pdf duplicate policy applied. */
export async function listReportFiles(root: string, policy: DuplicatePolicy): Promise<DirEntry[]> {
    const files = (await listFiles(root)).filter(f => isSupportedReport(f.name));
    return applyDuplicatePolicy(files, policy);
}

export function applyDuplicatePolicy<T extends { name: string }>(files: T[], policy: DuplicatePolicy): T[] {
    if (policy === 'all') return files;

    const isPdf = (f: T) => (PDF_EXTENSIONS as readonly string[]).includes(extname(f.name));
    const bases = (pdf: boolean) => new Set(files.filter(f => isPdf(f) === pdf).map(f => stem(f.name)));
    const csvBases = bases(false);
    const pdfBases = bases(true);

    return files.filter(f => policy === 'preferCsv'
        ? !(isPdf(f) && csvBases.has(stem(f.name)))
        : !(!isPdf(f) && pdfBases.has(stem(f.name))));
}

export function isSupportedReport(name: string): boolean {
    const ext = extname(name);
    return (DELIMITED_EXTENSIONS as readonly string[]).includes(ext)
        || (PDF_EXTENSIONS as readonly string[]).includes(ext);
}

// =============================================================================

export const nameFromPath = (p: string) => (p.split(/[\\/]/).pop() ?? '');

/** Lower-cased extension including the dot, '' when there is none. */
export function extname(p: string): string {
    const name = nameFromPath(p);
    const dot = name.lastIndexOf('.');
    return dot > 0 ? name.slice(dot).toLowerCase() : '';
}

export function stem(p: string): string {
    const name = nameFromPath(p);
    const dot = name.lastIndexOf('.');
    return dot > 0 ? name.slice(0, dot) : name;
}

/**
 * Fast normalization so Windows and POSIX paths compare equal.
 * @param p
 * @returns
 */
export const norm = (p: string) => p.replace(/\\/g, '/');
