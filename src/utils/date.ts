import dayjs from '@/lib/dayjs-setup';

const CANONICAL = 'YYYY-MM-DD HH:mm:ss';

const FORMATS = [
    CANONICAL,
    'YYYY/MM/DD HH:mm:ss',
    'YYYY-MM-DDTHH:mm:ss',
    'YYYY/MM/DD HH:mm',
    'YYYY-MM-DD HH:mm',
];

// "2023/1/5 下午 01:23:45", "2023/01/05 PM 1:23:45"
const MERIDIEM_RE = /^(\d{4})[/-](\d{1,2})[/-](\d{1,2})\s+(上午|下午|AM|PM)\s*(\d{1,2}):(\d{1,2}):(\d{1,2})$/i;
// "2023/1/5 13:23:45" with unpadded fields
const LOOSE_RE = /^(\d{4})[/-](\d{1,2})[/-](\d{1,2})\s+(\d{1,2}):(\d{1,2}):(\d{1,2})$/;
// ..._20250721095040.csv
const FILENAME_STAMP_RE = /(?:^|\D)(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})(?!\d)/;

const pad = (v: string | number) => String(v).padStart(2, '0');

function canonical(y: string, mo: string, d: string, h: number | string, mi: string, s: string): number | null {
    const parsed = dayjs(`${y}-${pad(mo)}-${pad(d)} ${pad(h)}:${pad(mi)}:${pad(s)}`, CANONICAL, true);
    return parsed.isValid() ? parsed.valueOf() : null;
}

/**
 * Parse a report timestamp (local time) into epoch ms.
 * Handles the Chinese/English meridiem layouts some instruments emit.
 * @returns null when the text is not a recognised timestamp
 */
export function parseReportDate(text: string | null | undefined): number | null {
    if (typeof text !== 'string') return null;
    const str = text.trim();
    if (!str) return null;

    const m = MERIDIEM_RE.exec(str);
    if (m) {
        const [, y, mo, d, ampm, hh, mi, s] = m;
        let hour = Number(hh);
        if (hour > 12) return null;
        const pm = ampm === '下午' || ampm.toUpperCase() === 'PM';
        if (pm && hour < 12) hour += 12;
        else if (!pm && hour === 12) hour = 0;
        return canonical(y, mo, d, hour, mi, s);
    }

    const loose = LOOSE_RE.exec(str);
    if (loose) {
        const [, y, mo, d, hh, mi, s] = loose;
        return canonical(y, mo, d, hh, mi, s);
    }

    const parsed = dayjs(str, FORMATS, true);
    return parsed.isValid() ? parsed.valueOf() : null;
}

/** Timestamp embedded in a file name as YYYYMMDDHHmmss, if any. */
export function parseFilenameStamp(fileName: string): number | null {
    const m = FILENAME_STAMP_RE.exec(fileName);
    if (!m) return null;
    const [, y, mo, d, h, mi, s] = m;
    return canonical(y, mo, d, h, mi, s);
}
