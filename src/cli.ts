import { parseArgs } from 'node:util';

import { AnalyzerSession } from './session';
import { InsufficientDataError, toErrorMessage } from './utils/errors';
import { fmtNum } from './utils/helper';
import { cpkBand } from './utils/statistics';

export const USAGE = 'usage: analyze <folder...> [--yield 0.95] [--export stats.csv] [--raw raw.csv] [--config file]';

export interface CliIo {
    out: (line: string) => void;
    err: (line: string) => void;
}

const defaultIo: CliIo = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
};

/** Render rows as a left-aligned text table. */
export function renderTable(header: string[], rows: string[][]): string[] {
    const widths = header.map((h, i) => Math.max(h.length, ...rows.map(r => (r[i] ?? '').length)));
    const line = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join('  ').trimEnd();
    return [line(header), line(widths.map(w => '-'.repeat(w))), ...rows.map(line)];
}

const parseCliArgs = (args: string[]) => parseArgs({
    args,
    allowPositionals: true,
    options: {
        yield: { type: 'string' },
        export: { type: 'string' },
        raw: { type: 'string' },
        config: { type: 'string' },
    },
});

/**
 * Run the CLI against `argv` (without the node/script prefix).
 * @returns process exit code
 */
export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
    let parsed: ReturnType<typeof parseCliArgs>;
    try {
        parsed = parseCliArgs(argv);
    } catch (err: unknown) {
        io.err(toErrorMessage(err));
        io.err(USAGE);
        return 2;
    }

    const [command, ...folders] = parsed.positionals;
    if (command !== 'analyze' || folders.length === 0) {
        io.err(USAGE);
        return 2;
    }

    try {
        const session = await AnalyzerSession.fromConfigFile(parsed.values.config);
        const targetYield = parsed.values.yield !== undefined ? Number(parsed.values.yield) : session.config.targetYield;

        for (const folder of folders) {
            const result = await session.importFolder(folder);
            io.out(`${folder}: ${result.recordsImported} records from ${result.filesSucceeded}/${result.filesTotal} files`);
            for (const f of result.failures) {
                io.err(`  ${f.kind} ${f.sourcePath}${f.lineNumber != null ? `:${f.lineNumber}` : ''}: ${f.message}`);
            }
            if (result.failuresTruncated > 0) io.err(`  …and ${result.failuresTruncated} more`);
        }

        const rows = session.getAllStatistics().map(s => {
            let tol: number | null = null;
            try {
                tol = session.suggestTolerance(s.itemName, targetYield).suggestedTolerance;
            } catch (err: unknown) {
                if (!(err instanceof InsufficientDataError)) throw err;
            }
            return [
                s.itemName,
                String(s.sampleCount),
                String(s.ngCount),
                fmtNum(s.failRate === null ? null : s.failRate * 100, 2),
                fmtNum(s.mean),
                fmtNum(s.stdDev),
                fmtNum(s.cpk, 3),
                cpkBand(s.cpk),
                fmtNum(tol),
            ];
        });
        io.out('');
        renderTable(['Item', 'n', 'NG', 'Fail %', 'Mean', 'Std Dev', 'CPK', 'Band', `±Tol @${targetYield}`], rows)
            .forEach(io.out);

        const summary = session.summary();
        io.out('');
        io.out(`files: ${summary.fileCount}  items: ${summary.itemCount}  items with NG: ${summary.itemsWithNg}  ` +
            `average yield: ${summary.averageYield === null ? 'N/A' : `${(summary.averageYield * 100).toFixed(2)}%`}`);

        if (parsed.values.export) await session.exportStatistics(parsed.values.export, targetYield);
        if (parsed.values.raw) await session.exportRawData(parsed.values.raw);
        return 0;
    } catch (err: unknown) {
        io.err(toErrorMessage(err));
        return 1;
    }
}
