/**
 * Shared test data and in-process stand-ins for the HTTP layer
 */

import axios, { AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { SourceFetcher } from '../weather/clients/base-client.js';
import { AcquisitionConfig, ObservationDocument, SourceConfig } from '../weather/types.js';

export const PRIMARY: SourceConfig = { id: 'KXXTEST1', priority: 1, displayName: 'Primary' };
export const BACKUP: SourceConfig = { id: 'KXXTEST2', priority: 2, displayName: 'Backup' };

export function makeConfig(overrides: Partial<AcquisitionConfig> = {}): AcquisitionConfig {
    return {
        apiKey: 'test-key',
        groupName: 'test-group',
        sources: [PRIMARY, BACKUP],
        unitSystem: 'metric',
        language: 'en-US',
        numericPrecision: 'none',
        forecastEnabled: true,
        calendarDayTemperature: false,
        refreshIntervalMs: 5 * 60 * 1000,
        requestTimeoutMs: 10000,
        failureThreshold: 3,
        ...overrides,
    };
}

export function currentPayload(stationID: string, lat: number = 47.21, lon: number = 18.62): Record<string, unknown> {
    return {
        observations: [
            {
                stationID,
                obsTimeUtc: '2025-10-19T09:55:00Z',
                neighborhood: 'Lakeside',
                country: 'HU',
                lat,
                lon,
                humidity: 71,
                winddir: 240,
                solarRadiation: 512.3,
                uv: 3,
                qcStatus: 1,
                customFlag: 'on',
                metric: {
                    temp: 14.2,
                    dewpt: 9.1,
                    windSpeed: 11,
                    windGust: null,
                    pressure: 1013.2,
                    precipRate: 0,
                    precipTotal: 0.4,
                    elev: 120,
                },
                imperial: {
                    temp: 57.6,
                    dewpt: 48.4,
                    windSpeed: 7,
                    windGust: null,
                    pressure: 29.92,
                    precipRate: 0,
                    precipTotal: 0.02,
                    elev: 394,
                },
            },
        ],
    };
}

export const VALID_TIMES = [1760853600, 1760940000, 1761026400, 1761112800, 1761199200];

export function forecastPayload(): Record<string, unknown> {
    return {
        dayOfWeek: ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday'],
        validTimeUtc: [...VALID_TIMES],
        temperatureMax: [19, 21, 17, 15, 16],
        temperatureMin: [8, 10, 9, 7, 6],
        calendarDayTemperatureMax: [20, 22, 18, 16, 17],
        calendarDayTemperatureMin: [7, 9, 8, 6, 5],
        daypart: [
            {
                daypartName: ['Today', 'Tonight', 'Monday', 'Monday night', 'Tuesday',
                    'Tuesday night', 'Wednesday', 'Wednesday night', 'Thursday', 'Thursday night'],
                temperature: [19, 9, 21, 11, 17, 10, 15, 8, 16, 7],
                iconCode: [30, 29, 32, 31, 11, 12, 26, 27, 44, 33],
                qpf: [0, 0, 0, 0, 5.1, 2.3, 0, 0, 0.2, 0],
                precipChance: [10, 5, 0, 0, 80, 60, 20, 10, 30, 10],
                windSpeed: [12, 8, 15, 9, 22, 18, 10, 7, 11, 6],
                windDirection: [240, 230, 250, 260, 200, 190, 180, 170, 160, 150],
            },
        ],
    };
}

export function mergedDocument(stationID: string = PRIMARY.id): ObservationDocument {
    const current = currentPayload(stationID);
    const observations = current.observations;
    return Object.freeze({
        ...current,
        ...forecastPayload(),
        observations: Array.isArray(observations) ? observations : [],
    });
}

export interface FakeReply {
    status: number;
    body: string;
}

export type FakeHandler = (url: string, config: InternalAxiosRequestConfig) => FakeReply | Promise<FakeReply>;

/**
 * axios instance answered in process by `handler`
 */
export function fakeHttp(handler: FakeHandler): { client: AxiosInstance; calls: string[] } {
    const calls: string[] = [];
    const client = axios.create({
        adapter: async (config: InternalAxiosRequestConfig) => {
            const url = config.url ?? '';
            calls.push(url);
            const reply = await handler(url, config);
            return {
                data: reply.body,
                status: reply.status,
                statusText: String(reply.status),
                headers: {},
                config,
            };
        },
    });
    return { client, calls };
}

export function json(body: unknown, status: number = 200): FakeReply {
    return { status, body: JSON.stringify(body) };
}

/**
 * Routes current-conditions requests by station id and answers every
 * forecast request with `forecast`
 */
export function wundergroundRoutes(
    stations: Record<string, FakeReply>,
    forecast: FakeReply = json(forecastPayload())
): FakeHandler {
    return (url: string) => {
        if (url.includes('/v3/wx/forecast/daily/5day')) return forecast;
        const match = /stationId=([^&]+)/.exec(url);
        const reply = match ? stations[decodeURIComponent(match[1])] : undefined;
        return reply ?? { status: 404, body: '' };
    };
}

export function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export interface FakeBehaviour {
    delayMs?: number;
    fail?: Error;
}

/**
 * SourceFetcher whose per-station outcome the test decides
 */
export class FakeFetcher implements SourceFetcher {
    calls: string[] = [];

    constructor(public behaviour: Record<string, FakeBehaviour> = {}) {}

    async fetch(source: SourceConfig): Promise<ObservationDocument> {
        this.calls.push(source.id);
        const behaviour = this.behaviour[source.id] ?? {};
        if (behaviour.delayMs) await delay(behaviour.delayMs);
        if (behaviour.fail) throw behaviour.fail;
        return mergedDocument(source.id);
    }
}
