import { describe, expect, it } from 'vitest';
import { parseFilenameStamp, parseReportDate } from './date';

const local = (y: number, mo: number, d: number, h = 0, mi = 0, s = 0) => new Date(y, mo - 1, d, h, mi, s).getTime();

describe('parseReportDate', () => {
    it('parses the Chinese meridiem layout', () => {
        expect(parseReportDate('2023/01/05 下午 01:23:45')).toBe(local(2023, 1, 5, 13, 23, 45));
        expect(parseReportDate('2023/1/5 上午 12:05:00')).toBe(local(2023, 1, 5, 0, 5, 0));
        expect(parseReportDate('2023/1/5 下午 12:05:00')).toBe(local(2023, 1, 5, 12, 5, 0));
    });

    it('parses the English meridiem layout', () => {
        expect(parseReportDate('2023/01/05 PM 1:23:45')).toBe(local(2023, 1, 5, 13, 23, 45));
        expect(parseReportDate('2023/01/05 am 09:00:00')).toBe(local(2023, 1, 5, 9, 0, 0));
    });

    it('parses 24-hour layouts', () => {
        expect(parseReportDate('2023-01-05 13:23:45')).toBe(local(2023, 1, 5, 13, 23, 45));
        expect(parseReportDate('2023/1/5 7:03:09')).toBe(local(2023, 1, 5, 7, 3, 9));
        expect(parseReportDate('2023/01/05 13:23')).toBe(local(2023, 1, 5, 13, 23, 0));
    });

    it('rejects impossible dates and noise', () => {
        expect(parseReportDate('2023/02/30 10:00:00')).toBeNull();
        expect(parseReportDate('2023/01/05 下午 13:00:00')).toBeNull();
        expect(parseReportDate('not a date')).toBeNull();
        expect(parseReportDate('')).toBeNull();
        expect(parseReportDate(null)).toBeNull();
    });
});

describe('parseFilenameStamp', () => {
    it('finds a 14-digit stamp', () => {
        expect(parseFilenameStamp('S1M_B003990_02_20250721095040.txt')).toBe(local(2025, 7, 21, 9, 50, 40));
    });

    it('ignores names without one', () => {
        expect(parseFilenameStamp('report.csv')).toBeNull();
        expect(parseFilenameStamp('lot_202507210950401.csv')).toBeNull();
    });
});
