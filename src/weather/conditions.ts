/**
 * Condition classifier: TWC icon codes to a small condition vocabulary, with a
 * solar-radiation estimate when no icon is available.
 */

import { rateLimitedLogger } from '../logger.js';
import { WeatherCondition, asNumber } from './types.js';

/** Icon code the upstream uses for "not available"; intentionally unmapped */
export const ICON_NOT_AVAILABLE = 44;

export const ICON_CONDITION_MAP: Readonly<Record<WeatherCondition, readonly number[]>> = {
    'clear-night': [31, 33],
    'cloudy': [26, 27, 28],
    'exceptional': [0, 1, 2, 19, 21, 22, 36, 43],
    'fog': [20],
    'hail': [17],
    'lightning': [],
    'lightning-rainy': [3, 4, 37, 38, 47],
    'partlycloudy': [29, 30],
    'pouring': [40],
    'rainy': [9, 11, 12, 39, 45],
    'snowy': [13, 14, 15, 16, 41, 42, 46],
    'snowy-rainy': [5, 6, 7, 8, 10, 18, 25, 35],
    'sunny': [32, 34],
    'windy': [23, 24],
    'windy-variant': [],
};

const WEATHER_CONDITIONS: readonly WeatherCondition[] = [
    'clear-night', 'cloudy', 'exceptional', 'fog', 'hail', 'lightning', 'lightning-rainy',
    'partlycloudy', 'pouring', 'rainy', 'snowy', 'snowy-rainy', 'sunny', 'windy', 'windy-variant',
];

const ICON_LOOKUP: ReadonlyMap<number, WeatherCondition> = new Map(
    WEATHER_CONDITIONS.flatMap(condition =>
        ICON_CONDITION_MAP[condition].map((code): [number, WeatherCondition] => [code, condition])
    )
);

export function iconToCondition(code: unknown): WeatherCondition | undefined {
    if (code === undefined || code === null) return undefined;

    const numeric = asNumber(code);
    const condition = numeric !== undefined ? ICON_LOOKUP.get(numeric) : undefined;
    if (condition) return condition;

    rateLimitedLogger.warn(
        `unmapped-icon:${String(code)}`,
        `Unmapped iconCode from TWC API (44 is Not Available): "${String(code)}"`
    );
    return undefined;
}

/**
 * Rough sky estimate from solar radiation (W/m²)
 */
export function conditionFromSolarRadiation(radiation: unknown): WeatherCondition | undefined {
    const wm2 = asNumber(radiation);
    if (wm2 === undefined) return undefined;
    if (wm2 > 800) return 'sunny';
    if (wm2 > 400) return 'partlycloudy';
    return 'cloudy';
}
