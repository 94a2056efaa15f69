/**
 * Weather Underground PWS client
 * Fetches one station's current observation and the geocoded 5-day forecast
 * and merges them into one document.
 * Documentation: https://www.wunderground.com/member/api-keys
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { logger, rateLimitedLogger } from '../../logger.js';
import { CoordinateStore } from '../../realtime/coordinator-state.js';
import {
    AcquisitionError,
    ApiError,
    HttpError,
    MalformedResponseError,
    NetworkError,
    NoObservationsError,
    TimeoutError,
} from '../errors.js';
import { FIELD_DAYPART, FIELD_ERRORS, FIELD_LATITUDE, FIELD_LONGITUDE, FIELD_OBSERVATIONS } from '../fields.js';
import { RequestBuilder, redactUrl } from '../request-builder.js';
import {
    AcquisitionConfig,
    Coordinates,
    ObservationDocument,
    Payload,
    SourceConfig,
    asNumber,
    isRecord,
} from '../types.js';
import { DEFAULT_HEADERS, SourceFetcher } from './base-client.js';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export class WundergroundClient implements SourceFetcher {
    private client: AxiosInstance;
    private requests: RequestBuilder;

    constructor(
        private readonly config: AcquisitionConfig,
        private readonly coordinates: CoordinateStore,
        httpClient?: AxiosInstance
    ) {
        this.requests = new RequestBuilder(config);
        this.client = httpClient ?? axios.create({
            headers: { ...DEFAULT_HEADERS },
            timeout: config.requestTimeoutMs,
        });
    }

    async fetch(source: SourceConfig, signal?: AbortSignal): Promise<ObservationDocument> {
        const currentUrl = this.requests.buildUrl('current', source.id);

        try {
            const current = await this.getJson(currentUrl, source.id, signal);

            const observations = current[FIELD_OBSERVATIONS];
            if (!Array.isArray(observations) || observations.length === 0) {
                throw new NoObservationsError(source.id);
            }
            const first: unknown = observations[0];
            if (!isRecord(first)) {
                throw new MalformedResponseError('Observation is not an object', source.id);
            }

            this.learnCoordinates(first, source.id);

            let forecast: Payload = {};
            if (this.config.forecastEnabled) {
                forecast = await this.fetchForecast(source.id, signal);
            }

            const document: ObservationDocument = {
                ...current,
                ...forecast,
                observations: observations.filter(isRecord),
            };
            return Object.freeze(document);
        } catch (error) {
            logger.debug(`Fetch failed for station ${source.id}`, {
                currentUrl: redactUrl(currentUrl),
                coordinates: this.coordinates.coordinates(),
            });
            throw error;
        }
    }

    private async fetchForecast(sourceId: string, signal?: AbortSignal): Promise<Payload> {
        // Another station of the same cycle may still report a location
        const coords = this.coordinates.coordinates() ??
            await this.coordinates.waitForCoordinates(this.config.requestTimeoutMs);
        if (!coords) {
            throw new MalformedResponseError('No coordinates known for the forecast request', sourceId);
        }

        const url = this.requests.buildUrl('forecast', sourceId, coords);
        const forecast = await this.getJson(url, sourceId, signal);

        const daypart = forecast[FIELD_DAYPART];
        if (!Array.isArray(daypart) || daypart.length === 0 || !isRecord(daypart[0])) {
            rateLimitedLogger.warn(
                `no-daypart:${sourceId}`,
                `Station ${sourceId}: No forecast daypart data available`
            );
        }

        return forecast;
    }

    /**
     * First write wins across stations; a later station with other
     * coordinates does not move the forecast location.
     */
    private learnCoordinates(observation: Payload, sourceId: string): void {
        if (this.coordinates.coordinates() !== null) return;

        const lat = asNumber(observation[FIELD_LATITUDE]);
        const lon = asNumber(observation[FIELD_LONGITUDE]);
        if (lat === undefined || lon === undefined) return;

        const candidate: Coordinates = { lat, lon };
        const effective = this.coordinates.learnCoordinates(candidate);
        if (effective.lat === lat && effective.lon === lon) {
            logger.info(`Learned coordinates from station ${sourceId}`, { lat, lon });
        }
    }

    private async getJson(url: string, sourceId: string, signal?: AbortSignal): Promise<Record<string, unknown>> {
        // axios only times out the wait for a response, not a slow body
        const deadline = AbortSignal.timeout(this.config.requestTimeoutMs);
        let response: AxiosResponse<unknown>;
        try {
            response = await this.client.get<unknown>(url, {
                headers: { ...DEFAULT_HEADERS },
                timeout: this.config.requestTimeoutMs,
                responseType: 'text',
                transformResponse: [(data: unknown) => data],
                validateStatus: () => true,
                signal: signal ? AbortSignal.any([signal, deadline]) : deadline,
            });
        } catch (error) {
            throw this.classifyTransportError(error, sourceId, deadline.aborted && !signal?.aborted);
        }

        if (response.status !== 200) {
            throw new HttpError(response.status, typeof response.data === 'string' ? response.data : '', sourceId);
        }

        const body = this.decodeBody(response.data, sourceId);
        this.checkErrors(url, body, sourceId);
        return body;
    }

    private decodeBody(data: unknown, sourceId: string): Record<string, unknown> {
        let parsed: unknown = data;
        if (typeof data === 'string') {
            if (data.trim().length === 0) {
                throw new MalformedResponseError('Empty response body', sourceId);
            }
            try {
                parsed = JSON.parse(data);
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                throw new MalformedResponseError(`Unparseable response body: ${reason}`, sourceId);
            }
        }

        if (parsed === null || parsed === undefined) {
            throw new MalformedResponseError('API returned null', sourceId);
        }
        if (!isRecord(parsed)) {
            throw new MalformedResponseError('Expected a JSON object', sourceId);
        }
        return parsed;
    }

    private checkErrors(url: string, body: Record<string, unknown>, sourceId: string): void {
        const errors = body[FIELD_ERRORS];
        if (!Array.isArray(errors) || errors.length === 0) return;

        const messages = errors.map(entry => {
            if (isRecord(entry)) {
                if (typeof entry.message === 'string') return entry.message;
                // v3 endpoints nest the message under `error`
                if (isRecord(entry.error) && typeof entry.error.message === 'string') return entry.error.message;
            }
            return JSON.stringify(entry);
        });
        throw new ApiError(redactUrl(url), messages, sourceId);
    }

    private classifyTransportError(error: unknown, sourceId: string, pastDeadline: boolean): AcquisitionError {
        if (axios.isCancel(error)) {
            if (pastDeadline) {
                return new TimeoutError(this.config.requestTimeoutMs, sourceId);
            }
            return new NetworkError('Request aborted', 'ERR_CANCELED', sourceId);
        }
        if (axios.isAxiosError(error)) {
            if (error.code && TIMEOUT_CODES.has(error.code)) {
                return new TimeoutError(this.config.requestTimeoutMs, sourceId);
            }
            return new NetworkError(error.message, error.code, sourceId);
        }
        return new NetworkError(error instanceof Error ? error.message : String(error), undefined, sourceId);
    }
}
