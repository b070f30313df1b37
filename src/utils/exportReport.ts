import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import dayjs from '@/lib/dayjs-setup';
import type { ItemStatistics, MeasurementRecord } from '@/types/measurement';
import { IOFailure } from './errors';
import { nameFromPath } from './fs';
import { fmtNum } from './helper';

const BOM = '\uFEFF';

export const STATISTICS_COLUMNS = [
    'Item', 'Sample Count', 'NG Count', 'Fail Rate (%)', 'Mean', 'Std Dev', 'CPK', 'Suggested Tolerance (±)',
];

export const RAW_DATA_COLUMNS = [
    'file', 'time', 'index', 'item', 'measured', 'design', 'diff', 'upper', 'lower', 'result',
];

export interface StatisticsRow {
    stats: ItemStatistics;
    suggestedTolerance: number | null;  // null when the item cannot be solved
}

/** Quote a cell when it holds a delimiter, a quote or a line break. */
export function csvCell(value: string | number): string {
    const s = String(value);
    return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

const csvLine = (cells: Array<string | number>) => cells.map(csvCell).join(',');

export function buildStatisticsCsv(rows: StatisticsRow[]): string {
    const lines = [csvLine(STATISTICS_COLUMNS)];
    for (const { stats, suggestedTolerance } of rows) {
        lines.push(csvLine([
            stats.itemName,
            stats.sampleCount,
            stats.ngCount,
            fmtNum(stats.failRate === null ? null : stats.failRate * 100, 2),
            fmtNum(stats.mean),
            fmtNum(stats.stdDev),
            fmtNum(stats.cpk, 3),
            fmtNum(suggestedTolerance),
        ]));
    }
    return lines.join('\n') + '\n';
}

export function buildRawDataCsv(records: Iterable<MeasurementRecord>): string {
    const lines = [csvLine(RAW_DATA_COLUMNS)];
    for (const r of records) {
        lines.push(csvLine([
            nameFromPath(r.sourcePath),
            r.timestamp === null ? '' : dayjs(r.timestamp).format('YYYY-MM-DD HH:mm:ss'),
            r.chipIndex,
            r.itemName,
            r.measuredValue,
            r.designValue,
            fmtNum(r.measuredValue - r.designValue),
            r.upperTolerance,
            r.lowerTolerance,
            r.result,
        ]));
    }
    return lines.join('\n') + '\n';
}

/** Write CSV content as UTF-8 with a BOM so spreadsheet tools pick the encoding. */
export async function writeCsv(path: string, content: string): Promise<string> {
    try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, BOM + content, 'utf-8');
    } catch (err: unknown) {
        throw new IOFailure(path, err);
    }
    return path;
}
