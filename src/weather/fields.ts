/**
 * Field schema of the Weather Underground payloads.
 *
 * Current conditions: a field is either read from the observation itself or
 * from the nested `metric` / `imperial` block. Forecast: a field is either one
 * value per calendar day (5 entries) or one value per daypart (10 entries,
 * day/night alternating).
 */

import { Quantity, UnitSystem, unitFor } from './units.js';

export const FIELD_OBSERVATIONS = 'observations';
export const FIELD_DAYPART = 'daypart';
export const FIELD_ERRORS = 'errors';

export const FIELD_LATITUDE = 'lat';
export const FIELD_LONGITUDE = 'lon';
export const FIELD_CONDITION_HUMIDITY = 'humidity';
export const FIELD_CONDITION_WINDDIR = 'winddir';
export const FIELD_CONDITION_SOLAR_RADIATION = 'solarRadiation';
export const FIELD_CONDITION_TEMP = 'temp';
export const FIELD_CONDITION_PRESSURE = 'pressure';
export const FIELD_CONDITION_WINDSPEED = 'windSpeed';

export const FIELD_FORECAST_VALIDTIMEUTC = 'validTimeUtc';
export const FIELD_FORECAST_TEMPERATUREMAX = 'temperatureMax';
export const FIELD_FORECAST_TEMPERATUREMIN = 'temperatureMin';
export const FIELD_FORECAST_CALENDARDAYTEMPERATUREMAX = 'calendarDayTemperatureMax';
export const FIELD_FORECAST_CALENDARDAYTEMPERATUREMIN = 'calendarDayTemperatureMin';
export const FIELD_FORECAST_TEMPERATURE = 'temperature';
export const FIELD_FORECAST_ICONCODE = 'iconCode';
export const FIELD_FORECAST_QPF = 'qpf';
export const FIELD_FORECAST_PRECIPCHANCE = 'precipChance';
export const FIELD_FORECAST_WINDSPEED = 'windSpeed';
export const FIELD_FORECAST_WINDDIRECTION = 'windDirection';

export type ConditionFieldSpec =
    | { kind: 'unitless' }
    | { kind: 'unit'; quantity: Quantity };

const UNITLESS: ConditionFieldSpec = { kind: 'unitless' };

function unit(quantity: Quantity): ConditionFieldSpec {
    return { kind: 'unit', quantity };
}

export const CONDITION_FIELDS: Readonly<Record<string, ConditionFieldSpec>> = {
    humidity: UNITLESS,
    winddir: UNITLESS,
    solarRadiation: UNITLESS,
    uv: UNITLESS,
    stationID: UNITLESS,
    neighborhood: UNITLESS,
    obsTimeLocal: UNITLESS,
    obsTimeUtc: UNITLESS,
    softwareType: UNITLESS,
    country: UNITLESS,
    lon: UNITLESS,
    lat: UNITLESS,
    realtimeFrequency: UNITLESS,
    epoch: UNITLESS,
    qcStatus: UNITLESS,
    windDirectionCardinal: UNITLESS,

    temp: unit('temperature'),
    heatIndex: unit('temperature'),
    dewpt: unit('temperature'),
    windChill: unit('temperature'),
    windSpeed: unit('speed'),
    windGust: unit('speed'),
    pressure: unit('pressure'),
    precipRate: unit('rate'),
    precipTotal: unit('length'),
    elev: unit('elevation'),
};

export type ForecastGranularity = 'day' | 'daypart';

/**
 * Forecast fields that `getForecast` resolves per calendar day. Anything not
 * listed is read from the daypart block.
 */
export const DAY_FORECAST_FIELDS: ReadonlySet<string> = new Set([
    FIELD_FORECAST_TEMPERATUREMAX,
    FIELD_FORECAST_TEMPERATUREMIN,
    FIELD_FORECAST_CALENDARDAYTEMPERATUREMAX,
    FIELD_FORECAST_CALENDARDAYTEMPERATUREMIN,
    FIELD_FORECAST_VALIDTIMEUTC,
]);

export function isUnitlessCondition(field: string): boolean {
    // Unknown fields are assumed unit-bearing, which is where the bulk of the payload lives
    return CONDITION_FIELDS[field]?.kind === 'unitless';
}

export function forecastGranularity(field: string): ForecastGranularity {
    return DAY_FORECAST_FIELDS.has(field) ? 'day' : 'daypart';
}

/**
 * Unit a unit-bearing condition field is reported in, or undefined for
 * unit-less and unknown fields
 */
export function unitOf(field: string, system: UnitSystem): string | undefined {
    const spec = CONDITION_FIELDS[field];
    if (!spec || spec.kind === 'unitless') return undefined;
    return unitFor(system, spec.quantity);
}
