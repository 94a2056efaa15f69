/**
 * Field accessor over the active document.
 *
 * Consumers read conditions and forecast values by upstream field name
 * without knowing the unit system or payload shape. Nothing here throws for
 * missing data: absent is `undefined`.
 */

import { iconToCondition, conditionFromSolarRadiation } from './conditions.js';
import {
    FIELD_CONDITION_SOLAR_RADIATION,
    FIELD_DAYPART,
    FIELD_FORECAST_CALENDARDAYTEMPERATUREMAX,
    FIELD_FORECAST_CALENDARDAYTEMPERATUREMIN,
    FIELD_FORECAST_ICONCODE,
    FIELD_FORECAST_PRECIPCHANCE,
    FIELD_FORECAST_QPF,
    FIELD_FORECAST_TEMPERATURE,
    FIELD_FORECAST_TEMPERATUREMAX,
    FIELD_FORECAST_TEMPERATUREMIN,
    FIELD_FORECAST_VALIDTIMEUTC,
    FIELD_FORECAST_WINDDIRECTION,
    FIELD_FORECAST_WINDSPEED,
    CONDITION_FIELDS,
    forecastGranularity,
    isUnitlessCondition,
    unitOf,
} from './fields.js';
import { unitsFor, UnitTable } from './units.js';
import {
    AcquisitionConfig,
    ActiveSelection,
    DailyForecastEntry,
    FieldValue,
    ObservationDocument,
    WeatherCondition,
    asFieldValue,
    asNumber,
    isRecord,
} from './types.js';

/** Days in the 5-day forecast; dayparts are twice as many */
export const MAX_FORECAST_DAYS = 5;

export class FieldAccessor {
    constructor(
        private readonly config: AcquisitionConfig,
        private readonly activeSelection: () => ActiveSelection | null
    ) {}

    private document(): ObservationDocument | undefined {
        return this.activeSelection()?.document;
    }

    getCondition(field: string): FieldValue | undefined {
        const observation = this.document()?.observations[0];
        if (!observation) return undefined;

        if (isUnitlessCondition(field)) {
            return asFieldValue(observation[field]);
        }

        const block = observation[this.config.unitSystem];
        const value = isRecord(block) ? asFieldValue(block[field]) : undefined;
        if (value !== undefined || field in CONDITION_FIELDS) return value;

        // Fields outside the schema may sit on the observation itself
        return asFieldValue(observation[field]);
    }

    /**
     * Per-day fields are indexed by `period / 2` into the 5-entry day arrays;
     * everything else by `period` into the 10-entry daypart arrays.
     */
    getForecast(field: string, period: number = 0): FieldValue | undefined {
        if (!Number.isInteger(period) || period < 0) return undefined;

        const doc = this.document();
        if (!doc) return undefined;

        if (forecastGranularity(field) === 'day') {
            return indexInto(doc[field], Math.floor(period / 2));
        }

        const daypart = doc[FIELD_DAYPART];
        if (!Array.isArray(daypart) || !isRecord(daypart[0])) return undefined;
        return indexInto(daypart[0][field], period);
    }

    /**
     * Any per-day array of the forecast (dayOfWeek, narrative, sunriseTimeLocal, ...)
     */
    getDailyValue(field: string, day: number = 0): FieldValue | undefined {
        if (!Number.isInteger(day) || day < 0) return undefined;
        const doc = this.document();
        return doc ? indexInto(doc[field], day) : undefined;
    }

    iconToCondition(code: unknown): WeatherCondition | undefined {
        return iconToCondition(code);
    }

    /**
     * Today's icon (day part, else night part), or a solar-radiation estimate
     */
    currentCondition(): WeatherCondition | undefined {
        const code = this.getForecast(FIELD_FORECAST_ICONCODE, 0) ?? this.getForecast(FIELD_FORECAST_ICONCODE, 1);
        return iconToCondition(code) ?? conditionFromSolarRadiation(this.getCondition(FIELD_CONDITION_SOLAR_RADIATION));
    }

    /**
     * Up to five daily entries from the day dayparts. After the day part
     * has expired (evening), the first entry comes from tonight instead.
     */
    dailyForecast(): DailyForecastEntry[] {
        const [maxField, minField] = this.config.calendarDayTemperature
            ? [FIELD_FORECAST_CALENDARDAYTEMPERATUREMAX, FIELD_FORECAST_CALENDARDAYTEMPERATUREMIN]
            : [FIELD_FORECAST_TEMPERATUREMAX, FIELD_FORECAST_TEMPERATUREMIN];

        const periods = Array.from({ length: MAX_FORECAST_DAYS }, (_, day) => day * 2);
        if (this.getForecast(FIELD_FORECAST_TEMPERATURE, 0) === undefined) {
            periods[0] = 1;
        }

        const entries: DailyForecastEntry[] = [];
        for (const period of periods) {
            const validTime = asNumber(this.getForecast(FIELD_FORECAST_VALIDTIMEUTC, period));
            if (validTime === undefined) continue;

            entries.push({
                time: new Date(validTime * 1000).toISOString(),
                condition: iconToCondition(this.getForecast(FIELD_FORECAST_ICONCODE, period)),
                precipitation: asNumber(this.getForecast(FIELD_FORECAST_QPF, period)),
                precipitationProbability: asNumber(this.getForecast(FIELD_FORECAST_PRECIPCHANCE, period)),
                temperature: asNumber(this.getForecast(maxField, period)),
                temperatureLow: asNumber(this.getForecast(minField, period)),
                windSpeed: asNumber(this.getForecast(FIELD_FORECAST_WINDSPEED, period)),
                windBearing: asNumber(this.getForecast(FIELD_FORECAST_WINDDIRECTION, period)),
            });
        }
        return entries;
    }

    units(): Readonly<UnitTable> {
        return unitsFor(this.config.unitSystem);
    }

    unitOf(field: string): string | undefined {
        return unitOf(field, this.config.unitSystem);
    }

    attribution(): string {
        const active = this.activeSelection()?.source;
        if (active) {
            return `Data provided by Weather Underground PWS ${active.id} (${active.displayName})`;
        }
        return 'Data provided by Weather Underground PWS';
    }
}

function indexInto(values: unknown, index: number): FieldValue | undefined {
    if (!Array.isArray(values) || index >= values.length) return undefined;
    return asFieldValue(values[index]);
}
