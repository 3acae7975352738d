import { InvalidUnitSystemError } from './errors.js';
import { DEFAULT_UNIT_SYSTEM, UNIT_SYSTEMS, UnitSystem } from './types.js';

const UNIT_ALIASES = new Map<string, UnitSystem>([
    ['standard', 'standard'],
    ['kelvin', 'standard'],
    ['k', 'standard'],
    ['metric', 'metric'],
    ['celsius', 'metric'],
    ['c', 'metric'],
    ['imperial', 'imperial'],
    ['fahrenheit', 'imperial'],
    ['f', 'imperial'],
]);

const TEMPERATURE_LABELS: Record<UnitSystem, string> = {
    standard: 'ºK',
    metric: 'ºC',
    imperial: 'ºF',
};

const SPEED_LABELS: Record<UnitSystem, string> = {
    standard: 'm/s',
    metric: 'm/s',
    imperial: 'MPH',
};

const METERS_PER_SECOND_TO_MPH = 2.236936;

export function isUnitSystem(value: unknown): value is UnitSystem {
    return UNIT_SYSTEMS.some(unitSystem => unitSystem === value);
}

/**
 * Parse a user-supplied unit name or alias. An empty value selects the default.
 */
export function parseUnitSystem(input: string): UnitSystem {
    const key = input.trim().toLowerCase();
    if (key === '') return DEFAULT_UNIT_SYSTEM;

    const unitSystem = UNIT_ALIASES.get(key);
    if (!unitSystem) {
        throw new InvalidUnitSystemError(input);
    }
    return unitSystem;
}

export function assertUnitSystem(value: unknown): UnitSystem {
    if (!isUnitSystem(value)) {
        throw new InvalidUnitSystemError(String(value));
    }
    return value;
}

/**
 * Convert a temperature from Kelvin.
 * Fahrenheit uses a 273 offset rather than 273.15; existing output depends on it.
 */
export function convertTemperature(kelvin: number, unitSystem: UnitSystem): number {
    switch (unitSystem) {
        case 'standard':
            return kelvin;
        case 'metric':
            return kelvin - 273.15;
        case 'imperial':
            return 1.8 * (kelvin - 273) + 32;
        default:
            throw new InvalidUnitSystemError(String(unitSystem));
    }
}

/**
 * Convert a speed from meters/second.
 */
export function convertSpeed(metersPerSecond: number, unitSystem: UnitSystem): number {
    switch (unitSystem) {
        case 'standard':
        case 'metric':
            return metersPerSecond;
        case 'imperial':
            return metersPerSecond * METERS_PER_SECOND_TO_MPH;
        default:
            throw new InvalidUnitSystemError(String(unitSystem));
    }
}

/**
 * Render a number with one decimal place. Values exactly halfway between two
 * tenths round to the even tenth (4.25 -> "4.2"); everything else matches toFixed.
 * Exact halves are the multiples of 0.25 that are not multiples of 0.5.
 */
export function toOneDecimal(value: number): string {
    const quarters = value * 4;
    if (Number.isInteger(quarters) && quarters % 2 !== 0) {
        const tenths = value * 10;
        const down = Math.floor(tenths);
        const even = down % 2 === 0 ? down : down + 1;
        return (even / 10).toFixed(1);
    }
    return value.toFixed(1);
}

export function temperatureLabel(unitSystem: UnitSystem): string {
    return TEMPERATURE_LABELS[assertUnitSystem(unitSystem)];
}

export function speedLabel(unitSystem: UnitSystem): string {
    return SPEED_LABELS[assertUnitSystem(unitSystem)];
}
