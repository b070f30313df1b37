import { DELIMITED_EXTENSIONS, METADATA_TIMESTAMP_LINES, PDF_EXTENSIONS } from '@/constants';
import { METADATA_TIMESTAMP_LABELS } from '@/constants/vocabulary';
import { ReportFormat } from '@/types/report';
import type { ColumnMap, ParsedReport, RawRow } from '@/types/report';
import { decodeReport, detectDelimiter, readRecords, splitLines, splitRecord } from './csv';
import { parseFilenameStamp, parseReportDate } from './date';
import { MalformedReportError, toErrorMessage } from './errors';
import { extname, nameFromPath } from './fs';
import { isCompleteHeader, resolveColumns } from './labels';
import { extractPdfLines, matchPdfRow, PDF_ROW_LABELS } from './pdf';

export interface ParseOptions {
    headerScanLines?: number;
}

const DEFAULT_HEADER_SCAN_LINES = 60;

const DATE_IN_TEXT_RE =
    /\d{4}[/-]\d{1,2}[/-]\d{1,2}\s+(?:(?:上午|下午|AM|PM)\s*)?\d{1,2}:\d{1,2}(?::\d{1,2})?/i;

/**
 * Parse one report's content. The row source is chosen by extension.
 * @throws MalformedReportError when the file has no usable header or table
 */
export async function parseReport(
    content: Uint8Array,
    sourcePath: string,
    options: ParseOptions = {}
): Promise<ParsedReport> {
    const ext = extname(sourcePath);

    if ((DELIMITED_EXTENSIONS as readonly string[]).includes(ext)) {
        const decoded = decodeReport(content);
        if (!decoded) throw new MalformedReportError('unrecognised text encoding', sourcePath);
        return parseDelimitedText(decoded.text, sourcePath, { ...options, encoding: decoded.encoding });
    }

    if ((PDF_EXTENSIONS as readonly string[]).includes(ext)) {
        let pages: string[][];
        try {
            pages = await extractPdfLines(content);
        } catch (err: unknown) {
            throw new MalformedReportError(`unreadable PDF: ${toErrorMessage(err)}`, sourcePath, { cause: err });
        }
        return parsePdfLines(pages, sourcePath);
    }

    throw new MalformedReportError(`unsupported file type "${ext || nameFromPath(sourcePath)}"`, sourcePath);
}

////////////////////////////////////////////////////////////////////////////////
// NOTE: Delimited text
////////////////////////////////////////////////////////////////////////////////

export function parseDelimitedText(
    text: string,
    sourcePath: string,
    options: ParseOptions & { encoding?: string } = {}
): ParsedReport {
    const lines = splitLines(text);
    const window = Math.min(lines.length, options.headerScanLines ?? DEFAULT_HEADER_SCAN_LINES);

    for (let i = 0; i < window; i++) {
        if (lines[i].trim() === '') continue;
        const delimiter = detectDelimiter(lines[i]);
        const header = splitRecord(lines[i], delimiter).map(c => c.trim());
        const columns = resolveColumns(header);
        if (!isCompleteHeader(columns)) continue;

        const preamble = lines.slice(0, Math.min(i, METADATA_TIMESTAMP_LINES));
        return {
            sourcePath,
            format: ReportFormat.Delimited,
            header,
            columns,
            measuredAt: findPreambleTimestamp(preamble) ?? parseFilenameStamp(nameFromPath(sourcePath)),
            encoding: options.encoding ?? 'utf-8',
            rows: delimitedRows(lines, i + 1, delimiter, header, columns),
        };
    }

    throw new MalformedReportError('header not found', sourcePath);
}

function* delimitedRows(
    lines: string[],
    start: number,
    delimiter: string,
    header: string[],
    columns: ColumnMap
): Generator<RawRow> {
    for (const { lineNumber, cells, defect } of readRecords(lines, start, delimiter)) {
        const values = cells.map(c => c.trim());
        const row: RawRow = {
            lineNumber,
            cells: header.map((label, idx): [string, string] => [label, values[idx] ?? '']),
        };
        if (defect) {
            yield { ...row, defect };
            continue;
        }
        if (values.every(v => v === '')) continue;
        if (columns.index !== undefined && (values[columns.index] ?? '') === '') continue;
        yield row;
    }
}

////////////////////////////////////////////////////////////////////////////////
// NOTE: PDF
////////////////////////////////////////////////////////////////////////////////

/** Build a report from clustered PDF lines (one array per page). */
export function parsePdfLines(pages: string[][], sourcePath: string): ParsedReport {
    const rows: RawRow[] = [];
    let lineNumber = 0;
    for (const page of pages) {
        for (const line of page) {
            lineNumber++;
            const cells = matchPdfRow(line);
            if (!cells) continue;
            rows.push({
                lineNumber,
                cells: PDF_ROW_LABELS.map((label, idx): [string, string] => [label, cells[idx]]),
            });
        }
    }
    if (rows.length === 0) throw new MalformedReportError('no measurement rows found', sourcePath);

    return {
        sourcePath,
        format: ReportFormat.Pdf,
        header: [...PDF_ROW_LABELS],
        columns: resolveColumns(PDF_ROW_LABELS),
        measuredAt: findPreambleTimestamp(pages[0] ?? []) ?? parseFilenameStamp(nameFromPath(sourcePath)),
        encoding: null,
        rows,
    };
}

////////////////////////////////////////////////////////////////////////////////
// NOTE: Metadata
////////////////////////////////////////////////////////////////////////////////

/** First labelled measurement time among the given metadata lines. */
export function findPreambleTimestamp(lines: string[]): number | null {
    for (const line of lines) {
        const lower = line.toLowerCase();
        const label = METADATA_TIMESTAMP_LABELS.find(l => lower.includes(l.toLowerCase()));
        if (!label) continue;
        const rest = line.slice(lower.indexOf(label.toLowerCase()) + label.length);
        const match = DATE_IN_TEXT_RE.exec(rest);
        const ts = match ? parseReportDate(match[0]) : null;
        if (ts !== null) return ts;
    }
    return null;
}
