/**
 * Grid settings: bounding range, default layout and cache limits.
 *
 * Defaults are read from data/grid-settings.yaml. Overrides can come from a
 * YAML document or a partial object; both are validated key by key.
 */

import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { LogHandler } from '@/utilities/log-handler';

export type HexLayoutName = 'pointy-top' | 'flat-top';

export interface GridSettings {
    /** Lowest coordinate value accepted by validity checks */
    minCoordinate: number;
    /** Highest coordinate value accepted by validity checks */
    maxCoordinate: number;

    defaultHexLayout: HexLayoutName;
    defaultSize: number;

    cacheEnabled: boolean;
    /** Cache context stops inserting once a cache holds this many entries */
    cacheMaxEntries: number;
}

const log = new LogHandler('GridSettings');

const HEX_LAYOUT_NAMES: readonly HexLayoutName[] = ['pointy-top', 'flat-top'];

const SETTINGS_FILE = new URL('./data/grid-settings.yaml', import.meta.url);

/** Fallback used when the settings file cannot be read */
const BUILTIN_SETTINGS: GridSettings = {
    minCoordinate: -10000,
    maxCoordinate: 10000,
    defaultHexLayout: 'pointy-top',
    defaultSize: 1,
    cacheEnabled: true,
    cacheMaxEntries: 1000,
};

type SettingParser<K extends keyof GridSettings> = (value: unknown, key: K) => GridSettings[K];

function parseInteger(value: unknown, key: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw new Error(`Grid setting "${key}" must be an integer, got ${JSON.stringify(value)}`);
    }
    return value;
}

function parsePositiveNumber(value: unknown, key: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
        throw new Error(`Grid setting "${key}" must be a positive number, got ${JSON.stringify(value)}`);
    }
    return value;
}

function parseBoolean(value: unknown, key: string): boolean {
    if (typeof value !== 'boolean') {
        throw new Error(`Grid setting "${key}" must be true or false, got ${JSON.stringify(value)}`);
    }
    return value;
}

function parseHexLayoutName(value: unknown, key: string): HexLayoutName {
    const match = HEX_LAYOUT_NAMES.find(name => name === value);
    if (match === undefined) {
        throw new Error(`Grid setting "${key}" must be one of ${HEX_LAYOUT_NAMES.join(', ')}, got ${JSON.stringify(value)}`);
    }
    return match;
}

const SETTING_PARSERS: { [K in keyof GridSettings]: SettingParser<K> } = {
    minCoordinate: parseInteger,
    maxCoordinate: parseInteger,
    defaultHexLayout: parseHexLayoutName,
    defaultSize: parsePositiveNumber,
    cacheEnabled: parseBoolean,
    cacheMaxEntries: (value, key) => {
        const n = parseInteger(value, key);
        if (n < 0) {
            throw new Error(`Grid setting "${key}" must not be negative, got ${n}`);
        }
        return n;
    },
};

function isSettingKey(key: string): key is keyof GridSettings {
    return Object.prototype.hasOwnProperty.call(SETTING_PARSERS, key);
}

function assignSetting<K extends keyof GridSettings>(target: GridSettings, key: K, value: unknown): void {
    target[key] = SETTING_PARSERS[key](value, key);
}

/**
 * Merge raw key/value pairs over a base. Throws on unknown keys, wrong types
 * and an inverted coordinate range.
 */
function mergeSettings(base: GridSettings, raw: Record<string, unknown>): GridSettings {
    const merged: GridSettings = { ...base };

    for (const [key, value] of Object.entries(raw)) {
        if (value === undefined) continue;
        if (!isSettingKey(key)) {
            throw new Error(`Unknown grid setting: "${key}". Valid settings: ${Object.keys(SETTING_PARSERS).join(', ')}`);
        }
        assignSetting(merged, key, value);
    }

    if (merged.minCoordinate > merged.maxCoordinate) {
        throw new Error(`Grid setting minCoordinate (${merged.minCoordinate}) exceeds maxCoordinate (${merged.maxCoordinate})`);
    }

    return merged;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse a YAML settings document over a base (the defaults unless given). */
export function parseGridSettings(yamlText: string, base: GridSettings = BUILTIN_SETTINGS): GridSettings {
    const raw: unknown = parseYaml(yamlText);
    if (raw === null || raw === undefined) {
        return { ...base };
    }
    if (!isRecord(raw)) {
        throw new Error('Grid settings document must be a mapping of setting names to values');
    }
    return mergeSettings(base, raw);
}

function loadDefaultSettings(): GridSettings {
    let text: string;
    try {
        text = readFileSync(SETTINGS_FILE, 'utf8');
    } catch (e) {
        const err = e instanceof Error ? e : new Error(String(e));
        log.warn(`Could not read ${SETTINGS_FILE.pathname} (${err.message}), using built-in defaults`);
        return { ...BUILTIN_SETTINGS };
    }

    try {
        return parseGridSettings(text, BUILTIN_SETTINGS);
    } catch (e) {
        log.error('Invalid default grid settings file', e);
        throw e;
    }
}

/** Defaults from data/grid-settings.yaml */
export const DEFAULT_GRID_SETTINGS: Readonly<GridSettings> = Object.freeze(loadDefaultSettings());

/** Create settings from a partial object merged over the defaults. */
export function createGridSettings(overrides: Partial<GridSettings> = {}): GridSettings {
    return mergeSettings(DEFAULT_GRID_SETTINGS, { ...overrides });
}

/** Load settings from a YAML document merged over the defaults. */
export function loadGridSettings(yamlText: string): GridSettings {
    const settings = parseGridSettings(yamlText, DEFAULT_GRID_SETTINGS);
    log.info(`Loaded grid settings: range [${settings.minCoordinate}, ${settings.maxCoordinate}], layout ${settings.defaultHexLayout}`);
    return settings;
}

/** True when every value lies inside the configured bounding range. */
export function isWithinCoordinateRange(settings: Readonly<GridSettings>, ...values: number[]): boolean {
    return values.every(v => Number.isInteger(v) && v >= settings.minCoordinate && v <= settings.maxCoordinate);
}
