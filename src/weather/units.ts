/**
 * Unit system table: which unit each measured quantity is reported in for the
 * upstream `units=m` / `units=e` selection.
 */

export type UnitSystem = 'metric' | 'imperial';

export type UnitSystemCode = 'm' | 'e';

export type Quantity = 'temperature' | 'length' | 'speed' | 'pressure' | 'rate' | 'elevation';

export interface UnitTable {
    apiCode: UnitSystemCode;
    temperature: string;
    length: string;
    speed: string;
    pressure: string;
    rate: string;
    elevation: string;
}

export const UNIT_SYSTEMS: Readonly<Record<UnitSystem, Readonly<UnitTable>>> = {
    metric: {
        apiCode: 'm',
        temperature: '°C',
        length: 'mm',
        speed: 'km/h',
        pressure: 'mbar',
        rate: 'mm/h',
        elevation: 'm',
    },
    imperial: {
        apiCode: 'e',
        temperature: '°F',
        length: 'in',
        speed: 'mph',
        pressure: 'inHg',
        rate: 'in/h',
        elevation: 'ft',
    },
};

export function isUnitSystem(value: string): value is UnitSystem {
    return value === 'metric' || value === 'imperial';
}

export function unitsFor(system: UnitSystem): Readonly<UnitTable> {
    return UNIT_SYSTEMS[system];
}

export function apiCodeFor(system: UnitSystem): UnitSystemCode {
    return UNIT_SYSTEMS[system].apiCode;
}

export function unitFor(system: UnitSystem, quantity: Quantity): string {
    return UNIT_SYSTEMS[system][quantity];
}
