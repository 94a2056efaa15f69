import dotenv from 'dotenv';
import { ConfigError } from './weather/errors.js';
import { isUnitSystem, UnitSystem } from './weather/units.js';
import { AcquisitionConfig, Coordinates, NumericPrecision, SourceConfig } from './weather/types.js';

dotenv.config();

export type Env = Record<string, string | undefined>;

export interface Config {
    // Weather Underground
    apiKey: string;
    groupName: string;
    stations: SourceConfig[];

    // Request shaping
    unitSystem: string;
    language: string;
    numericPrecision: string;
    forecastEnabled: boolean;
    calendarDayTemperature: boolean;
    requestTimeoutMs: number;

    // Scheduling
    refreshIntervalMinutes: number;
    failureThreshold: number;        // Consecutive failed cycles before health turns 'failing'

    // Optional fixed location; otherwise learned from the first observation
    latitude: number | null;
    longitude: number | null;

    // Logging
    logLevel: string;
    logDir: string;
}

function getEnvVarOptional(env: Env, name: string, defaultValue: string): string {
    return env[name] || defaultValue;
}

function getEnvVarBool(env: Env, name: string, defaultValue: boolean): boolean {
    const value = env[name];
    if (!value) return defaultValue;
    return value.toLowerCase() === 'true';
}

export function getEnvVarNumber(env: Env, name: string, defaultValue: number): number {
    const value = env[name];
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    if (isNaN(parsed)) return defaultValue;
    return parsed;
}

function getEnvVarCoordinate(env: Env, name: string): number | null {
    const value = env[name];
    if (!value) return null;
    const parsed = parseFloat(value);
    return isNaN(parsed) ? null : parsed;
}

/**
 * Parse `KXXTEST1:1:Back garden,KXXTEST2:2` into station configs.
 * Priority defaults to the 1-based position; display name defaults to the id.
 */
export function parseStations(raw: string): SourceConfig[] {
    return raw
        .split(',')
        .map(entry => entry.trim())
        .filter(entry => entry.length > 0)
        .map((entry, index) => {
            const [rawId, rawPriority, ...name] = entry.split(':');
            const id = rawId.trim();
            const priority = rawPriority?.trim();
            const displayName = name.join(':').trim();
            return {
                id,
                priority: priority ? Number(priority) : index + 1,
                displayName: displayName || id,
            };
        });
}

export function loadConfig(env: Env): Config {
    return {
        apiKey: getEnvVarOptional(env, 'WU_API_KEY', ''),
        groupName: getEnvVarOptional(env, 'PWS_GROUP_NAME', 'default'),
        stations: parseStations(getEnvVarOptional(env, 'PWS_STATIONS', '')),

        unitSystem: getEnvVarOptional(env, 'PWS_UNIT_SYSTEM', 'metric').toLowerCase(),
        language: getEnvVarOptional(env, 'PWS_LANGUAGE', 'en-US'),
        numericPrecision: getEnvVarOptional(env, 'PWS_NUMERIC_PRECISION', 'none').toLowerCase(),
        forecastEnabled: getEnvVarBool(env, 'PWS_FORECAST_ENABLED', true),
        calendarDayTemperature: getEnvVarBool(env, 'PWS_CALENDAR_DAY_TEMPERATURE', false),
        requestTimeoutMs: getEnvVarNumber(env, 'PWS_REQUEST_TIMEOUT_MS', 10000),

        refreshIntervalMinutes: getEnvVarNumber(env, 'PWS_REFRESH_INTERVAL_MINUTES', 5),
        failureThreshold: getEnvVarNumber(env, 'PWS_FAILURE_THRESHOLD', 3),

        latitude: getEnvVarCoordinate(env, 'PWS_LATITUDE'),
        longitude: getEnvVarCoordinate(env, 'PWS_LONGITUDE'),

        logLevel: getEnvVarOptional(env, 'LOG_LEVEL', 'info'),
        logDir: getEnvVarOptional(env, 'LOG_DIR', 'logs'),
    };
}

export const config: Config = loadConfig(process.env);

function isNumericPrecision(value: string): value is NumericPrecision {
    return value === 'none' || value === 'decimal';
}

export function validateConfig(cfg: Config): void {
    if (!cfg.apiKey) {
        throw new ConfigError('WU_API_KEY is required');
    }
    if (cfg.stations.length === 0) {
        throw new ConfigError('PWS_STATIONS must name at least one station');
    }

    const seen = new Set<string>();
    for (const station of cfg.stations) {
        if (!station.id) {
            throw new ConfigError('PWS_STATIONS contains an empty station id');
        }
        if (!Number.isInteger(station.priority)) {
            throw new ConfigError(`Station ${station.id} has a non-integer priority`);
        }
        if (seen.has(station.id)) {
            throw new ConfigError(`Station ${station.id} is configured more than once`);
        }
        seen.add(station.id);
    }

    if (!isUnitSystem(cfg.unitSystem)) {
        throw new ConfigError(`PWS_UNIT_SYSTEM must be 'metric' or 'imperial', got '${cfg.unitSystem}'`);
    }
    if (!isNumericPrecision(cfg.numericPrecision)) {
        throw new ConfigError(`PWS_NUMERIC_PRECISION must be 'none' or 'decimal', got '${cfg.numericPrecision}'`);
    }
    if ((cfg.latitude === null) !== (cfg.longitude === null)) {
        throw new ConfigError('PWS_LATITUDE and PWS_LONGITUDE must be set together');
    }
    if (cfg.latitude !== null && (cfg.latitude < -90 || cfg.latitude > 90)) {
        throw new ConfigError(`PWS_LATITUDE out of range: ${cfg.latitude}`);
    }
    if (cfg.longitude !== null && (cfg.longitude < -180 || cfg.longitude > 180)) {
        throw new ConfigError(`PWS_LONGITUDE out of range: ${cfg.longitude}`);
    }
    if (cfg.refreshIntervalMinutes <= 0 || cfg.requestTimeoutMs <= 0) {
        throw new ConfigError('Refresh interval and request timeout must be positive');
    }
    if (cfg.failureThreshold < 1) {
        throw new ConfigError('PWS_FAILURE_THRESHOLD must be at least 1');
    }
}

/**
 * Sort by priority, keeping configuration order on ties (Array.prototype.sort is stable).
 */
export function sortByPriority(sources: readonly SourceConfig[]): SourceConfig[] {
    return [...sources].sort((a, b) => a.priority - b.priority);
}

/**
 * Validate and freeze the configuration a coordinator runs with
 */
export function toAcquisitionConfig(cfg: Config): AcquisitionConfig {
    validateConfig(cfg);

    // Narrowed again for the compiler; validateConfig has already rejected other values
    const unitSystem: UnitSystem = cfg.unitSystem === 'imperial' ? 'imperial' : 'metric';
    const numericPrecision: NumericPrecision = cfg.numericPrecision === 'decimal' ? 'decimal' : 'none';
    const coordinates: Coordinates | undefined =
        cfg.latitude !== null && cfg.longitude !== null
            ? { lat: cfg.latitude, lon: cfg.longitude }
            : undefined;

    return Object.freeze({
        apiKey: cfg.apiKey,
        groupName: cfg.groupName,
        sources: Object.freeze(sortByPriority(cfg.stations).map(s => Object.freeze({ ...s }))),
        unitSystem,
        language: cfg.language,
        numericPrecision,
        forecastEnabled: cfg.forecastEnabled,
        calendarDayTemperature: cfg.calendarDayTemperature,
        refreshIntervalMs: cfg.refreshIntervalMinutes * 60 * 1000,
        requestTimeoutMs: cfg.requestTimeoutMs,
        failureThreshold: cfg.failureThreshold,
        coordinates: coordinates ? Object.freeze(coordinates) : undefined,
    });
}
