import { PDF_LINE_TOLERANCE } from '@/constants';

/** One word placed on a page; `top` grows downwards like screen coordinates. */
export interface PositionedWord {
    text: string;
    x: number;
    top: number;
}

// Canonical labels of the instrument table, fed to the label resolver as the header
export const PDF_ROW_LABELS = ['No', '測量專案', '實測值', '單位', '設計值', '上限公差', '下限公差', '判斷'];

// No  Item  Value  Unit  Design  Upper  Lower  Judgement
const ROW_RE = new RegExp(
    '^\\s*(\\d+)\\s+'
    + '(.+?)\\s+'
    + '(-?\\d+(?:\\.\\d+)?)\\s+'
    + '(mm|um|μm|µm|deg|°)\\s+'
    + '(-?\\d+(?:\\.\\d+)?)\\s+'
    + '(-?\\d+(?:\\.\\d+)?)\\s+'
    + '(-?\\d+(?:\\.\\d+)?)\\s+'
    + '(OK|NG|---|Warning)',
);

// Table headings and page titles that can look like rows
const NOISE = ['測量專案', '部件報告', '測量結果'];

/**
 * Group words into text lines: a word joins the first line whose anchor
 * is within `tolerance` pt vertically. Lines come out top to bottom, words
 * left to right, joined by one space.
 */
export function clusterLines(words: PositionedWord[], tolerance = PDF_LINE_TOLERANCE): string[] {
    const rows: Array<{ top: number; words: PositionedWord[] }> = [];
    for (const word of words) {
        if (word.text.trim() === '') continue;
        const row = rows.find(r => Math.abs(word.top - r.top) <= tolerance);
        if (row) row.words.push(word);
        else rows.push({ top: word.top, words: [word] });
    }
    return rows
        .sort((a, b) => a.top - b.top)
        .map(r => r.words
            .slice()
            .sort((a, b) => a.x - b.x)
            .map(w => w.text.trim())
            .join(' '));
}

/** Cells of one instrument table line, in `PDF_ROW_LABELS` order, or null. */
export function matchPdfRow(line: string): string[] | null {
    if (NOISE.some(n => line.includes(n))) return null;
    const m = ROW_RE.exec(line);
    if (!m) return null;
    const [, no, item, value, unit, design, upper, lower, judge] = m;
    return [no, item.trim(), value, unit, design, upper, lower, judge];
}

/**
 * Extract clustered text lines per page. pdfjs is loaded lazily so that
 * delimited-only imports never pay for it.
 */
export async function extractPdfLines(bytes: Uint8Array): Promise<string[][]> {
    const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
    const doc = await pdfjs.getDocument({
        data: new Uint8Array(bytes),    // pdfjs detaches the buffer it is given
        useWorkerFetch: false,
        isEvalSupported: false,
        disableFontFace: true,
        verbosity: 0,
    }).promise;

    try {
        const pages: string[][] = [];
        for (let p = 1; p <= doc.numPages; p++) {
            const page = await doc.getPage(p);
            const { width, height } = page.getViewport({ scale: 1 });
            const content = await page.getTextContent();
            const words: PositionedWord[] = [];
            for (const item of content.items) {
                if (!('str' in item)) continue;
                const x = Number(item.transform[4]);
                const top = height - Number(item.transform[5]);
                if (x < 0 || x > width || top < 0 || top > height) continue;
                words.push({ text: item.str, x, top });
            }
            pages.push(clusterLines(words));
            page.cleanup();
        }
        return pages;
    } finally {
        await doc.destroy();
    }
}
