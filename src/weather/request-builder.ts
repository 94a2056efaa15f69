/**
 * Builds the two Weather Underground request URLs for a station.
 * Current conditions are station-scoped; the forecast is geocoded.
 */

import { apiCodeFor } from './units.js';
import { AcquisitionConfig, Coordinates, RequestKind } from './types.js';

export const CURRENT_CONDITIONS_URL = 'https://api.weather.com/v2/pws/observations/current';
export const DAILY_FORECAST_URL = 'https://api.weather.com/v3/wx/forecast/daily/5day';

export class RequestBuilder {
    constructor(private readonly config: AcquisitionConfig) {}

    buildUrl(kind: RequestKind, sourceId: string, coords?: Coordinates): string {
        let url: string;

        if (kind === 'current') {
            url = `${CURRENT_CONDITIONS_URL}?stationId=${encodeURIComponent(sourceId)}`;
            if (this.config.numericPrecision !== 'none') {
                url += `&numericPrecision=${encodeURIComponent(this.config.numericPrecision)}`;
            }
        } else {
            if (!coords) {
                throw new Error(`Forecast URL for ${sourceId} needs coordinates`);
            }
            url = `${DAILY_FORECAST_URL}?geocode=${encodeURIComponent(String(coords.lat))},${encodeURIComponent(String(coords.lon))}`;
            url += `&language=${encodeURIComponent(this.config.language)}`;
        }

        return url + this.sharedSuffix();
    }

    private sharedSuffix(): string {
        return `&format=json&apiKey=${encodeURIComponent(this.config.apiKey)}` +
            `&units=${apiCodeFor(this.config.unitSystem)}`;
    }
}

/**
 * Mask the API key before a URL goes to the logs
 */
export function redactUrl(url: string): string {
    return url.replace(/([?&]apiKey=)[^&]*/, '$1***');
}
