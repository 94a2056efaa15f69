/**
 * Weather data types shared by the fetcher, selector, accessor and scheduler
 */

import type { AcquisitionError } from './errors.js';
import type { UnitSystem } from './units.js';

export interface Coordinates {
    lat: number;
    lon: number;
}

export type NumericPrecision = 'none' | 'decimal';

export type RequestKind = 'current' | 'forecast';

/**
 * One configured personal weather station
 */
export interface SourceConfig {
    readonly id: string;
    /** Lower value = higher priority; ties keep configuration order */
    readonly priority: number;
    readonly displayName: string;
}

/**
 * Immutable configuration of one coordinator instance
 */
export interface AcquisitionConfig {
    readonly apiKey: string;
    readonly groupName: string;
    /** Sorted by priority at construction, stable on ties */
    readonly sources: readonly SourceConfig[];
    readonly unitSystem: UnitSystem;
    readonly language: string;
    readonly numericPrecision: NumericPrecision;
    readonly forecastEnabled: boolean;
    readonly calendarDayTemperature: boolean;
    readonly refreshIntervalMs: number;
    readonly requestTimeoutMs: number;
    readonly failureThreshold: number;
    readonly coordinates?: Readonly<Coordinates>;
}

export type Payload = Readonly<Record<string, unknown>>;

/**
 * Merged current-conditions + forecast payload of one station.
 * Frozen once produced.
 */
export interface ObservationDocument {
    readonly observations: readonly Payload[];
    readonly daypart?: unknown;
    readonly [key: string]: unknown;
}

export type SourceState = 'UNKNOWN' | 'ONLINE' | 'OFFLINE';

export interface SourceStatus {
    readonly source: SourceConfig;
    readonly state: SourceState;
    /** Kept for diagnostics after the station goes offline */
    readonly lastDocument: ObservationDocument | null;
    readonly lastSuccessAt: Date | null;
    readonly lastAttemptAt: Date | null;
    readonly lastError: AcquisitionError | null;
    readonly consecutiveFailures: number;
}

/**
 * Consumer-facing view of one station's status
 */
export interface SourceStatusReport {
    name: string;
    priority: number;
    isActive: boolean;
    lastSuccessTime: Date | null;
    state: SourceState;
    lastError: string | null;
    consecutiveFailures: number;
}

export interface ActiveSelection {
    readonly source: SourceConfig;
    readonly document: ObservationDocument;
}

export type FieldValue = string | number | boolean;

export type WeatherCondition =
    | 'clear-night'
    | 'cloudy'
    | 'exceptional'
    | 'fog'
    | 'hail'
    | 'lightning'
    | 'lightning-rainy'
    | 'partlycloudy'
    | 'pouring'
    | 'rainy'
    | 'snowy'
    | 'snowy-rainy'
    | 'sunny'
    | 'windy'
    | 'windy-variant';

/**
 * One day of the daily forecast as handed to display layers
 */
export interface DailyForecastEntry {
    time: string;
    condition?: WeatherCondition;
    precipitation?: number;
    precipitationProbability?: number;
    temperature?: number;
    temperatureLow?: number;
    windSpeed?: number;
    windBearing?: number;
}

export type CoordinatorHealth = 'healthy' | 'degraded' | 'failing';

export interface RefreshOutcome {
    succeeded: boolean;
    activeSourceId: string | null;
    failures: ReadonlyMap<string, AcquisitionError>;
    completedAt: Date;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow an upstream value to something a consumer can display; null and
 * nested structures count as absent.
 */
export function asFieldValue(value: unknown): FieldValue | undefined {
    if (typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    return undefined;
}

export function asNumber(value: unknown): number | undefined {
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
