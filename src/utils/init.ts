import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { CONFIG_FILENAME } from '@/constants';
import { initialConfig } from '@/constants/default';
import type { AnalyzerConfig } from '@/types/config';
import { IOFailure } from './errors';
import { mergeDefinedKeys } from './helper';
import type { Logger } from './log';
import { isValidAnalyzerConfig, validateConfig } from './validators';

/** Defaults with `overrides` applied, range-checked. */
export function resolveConfig(overrides: Partial<AnalyzerConfig> = {}): AnalyzerConfig {
    return validateConfig(mergeDefinedKeys(initialConfig, overrides));
}

/**
 * Load the analyzer config.
 * - An explicit `path` must exist (`IOFailure` otherwise).
 * - Without one, `analyzer.config.json` in the working directory is used if present.
 * - A file that is not valid JSON or has wrongly typed keys is ignored with a warning.
 * @throws InvalidParameterError when a value is out of range
 */
export async function loadConfig(path?: string, logger?: Logger): Promise<AnalyzerConfig> {
    const fullPath = resolve(path ?? CONFIG_FILENAME);

    let text: string;
    try {
        text = await readFile(fullPath, 'utf-8');
    } catch (err: unknown) {
        if (path) throw new IOFailure(fullPath, err);
        logger?.debug(`no ${CONFIG_FILENAME} in working directory, using defaults`);
        return resolveConfig();
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (err: unknown) {
        logger?.warn(`Config ${fullPath} is not valid JSON, using defaults:`, err);
        return resolveConfig();
    }

    if (!isValidAnalyzerConfig(parsed)) {
        logger?.warn(`Config ${fullPath} has invalid fields, using defaults`);
        return resolveConfig();
    }

    return resolveConfig(parsed);
}
