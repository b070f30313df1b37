export function mergeDefinedKeys<T extends object>(
    base: T,
    override: Partial<Record<keyof T, unknown>>
): T {
    const result = { ...base };
    for (const key in base) {
        if (
            Object.prototype.hasOwnProperty.call(override, key) &&
            override[key] !== undefined &&
            override[key] !== null
        ) {
            result[key] = override[key] as T[typeof key];
        }
    }
    return result;
}

/** "1, 2, 10, A1, A2" ordering for item names and file names. */
export function naturalCompare(a: string, b: string): number {
    return a.localeCompare(b, undefined, { numeric: true, sensitivity: 'base' });
}

/** Format a number or report N/A; used by the exporter and the CLI table. */
export function fmtNum(v: number | null, digits = 4): string {
    return v == null || !Number.isFinite(v) ? 'N/A' : v.toFixed(digits);
}
