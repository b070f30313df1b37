import { REPORT_ENCODINGS } from '@/constants';

export const DELIMITERS = [',', '\t', ';'] as const;
export type Delimiter = typeof DELIMITERS[number];

export interface DecodedText {
    text: string;
    encoding: string;
}

/**
 * Decode report bytes, trying each encoding strictly in turn.
 * UTF-8 drops a leading BOM. Returns null when no encoding fits.
 */
export function decodeReport(bytes: Uint8Array, encodings: readonly string[] = REPORT_ENCODINGS): DecodedText | null {
    for (const encoding of encodings) {
        let decoder: TextDecoder;
        try {
            decoder = new TextDecoder(encoding, { fatal: true });
        } catch (err: unknown) {
            // Runtime built without this codec
            console.debug('[csv] decoder unavailable', encoding, err);
            continue;
        }
        try {
            return { text: decoder.decode(bytes), encoding };
        } catch {
            // not this encoding; try the next one
            continue;
        }
    }
    return null;
}

/** Split text into lines, keeping CR-LF and LF files alike. */
export function splitLines(text: string): string[] {
    const lines = text.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
    return lines;
}

/** Pick the delimiter that occurs most often outside quotes; ',' when none does. */
export function detectDelimiter(line: string): Delimiter {
    let best: Delimiter = ',';
    let bestCount = 0;
    for (const d of DELIMITERS) {
        const count = splitRecord(line, d).length - 1;
        if (count > bestCount) {
            best = d;
            bestCount = count;
        }
    }
    return best;
}

/**
 * Split one line per RFC 4180: quoted fields may contain the delimiter,
 * "" is an escaped quote. Cells are returned untrimmed.
 */
export function splitRecord(line: string, delimiter: string): string[] {
    return finish(scan(newScan(), line, delimiter));
}

interface ScanState {
    cells: string[];
    cell: string;
    quoted: boolean;                    // inside a quoted field
}

const newScan = (): ScanState => ({ cells: [], cell: '', quoted: false });

/** Feed `text` to the scanner. A quote only opens a field at the start of a cell. */
function scan(state: ScanState, text: string, delimiter: string): ScanState {
    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (state.quoted) {
            if (ch === '"') {
                if (text[i + 1] === '"') {
                    state.cell += '"';
                    i++;
                } else {
                    state.quoted = false;
                }
            } else {
                state.cell += ch;
            }
        } else if (ch === '"' && state.cell.trim() === '') {
            state.cell = '';
            state.quoted = true;
        } else if (ch === delimiter) {
            state.cells.push(state.cell);
            state.cell = '';
        } else {
            state.cell += ch;
        }
    }
    return state;
}

const finish = (state: ScanState) => [...state.cells, state.cell];

export interface TextRecord {
    lineNumber: number;
    cells: string[];
    defect?: string;                    // set when the line could not be read as a record
}

/**
 * Records from `lines[start..]`. A quoted field left open at the end of a
 * line continues on the next one; the record keeps its first line number.
 * A field still open at the end of the text marks its first line as a
 * defect, and reading resumes on the line after it.
 */
export function* readRecords(lines: string[], start: number, delimiter: string): Generator<TextRecord> {
    let i = start;
    while (i < lines.length) {
        const first = i;
        const state = scan(newScan(), lines[i++], delimiter);
        while (state.quoted && i < lines.length) {
            scan(state, '\n' + lines[i++], delimiter);
        }
        if (state.quoted) {
            yield { lineNumber: first + 1, cells: splitRecord(lines[first], delimiter), defect: 'unterminated quoted field' };
            i = first + 1;
        } else {
            yield { lineNumber: first + 1, cells: finish(state) };
        }
    }
}
