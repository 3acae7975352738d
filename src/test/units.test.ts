/**
 * Unit System Test Suite
 *
 * - Parsing unit names and aliases, and the imperial default
 * - Kelvin and meters/second conversions
 * - Temperature and speed labels
 * - One-decimal rendering with exact halves rounded to even
 */

import { describe, it, expect } from '@jest/globals';
import {
    convertSpeed,
    convertTemperature,
    isUnitSystem,
    parseUnitSystem,
    speedLabel,
    temperatureLabel,
    toOneDecimal,
} from '../weather/units.js';
import { InvalidUnitSystemError } from '../weather/errors.js';

describe('parseUnitSystem', () => {
    it.each([
        ['standard', 'standard'],
        ['kelvin', 'standard'],
        ['k', 'standard'],
        ['metric', 'metric'],
        ['Celsius', 'metric'],
        ['C', 'metric'],
        ['imperial', 'imperial'],
        ['FAHRENHEIT', 'imperial'],
        [' f ', 'imperial'],
    ])('parses %s as %s', (input, expected) => {
        expect(parseUnitSystem(input)).toBe(expected);
    });

    it('defaults to imperial for an empty value', () => {
        expect(parseUnitSystem('')).toBe('imperial');
    });

    it('rejects anything else', () => {
        expect(() => parseUnitSystem('miles')).toThrow(InvalidUnitSystemError);
        expect(() => parseUnitSystem('constructor')).toThrow(InvalidUnitSystemError);
        expect(() => parseUnitSystem('miles')).toThrow(
            'Unit system "miles" is invalid, please specify one of standard (k, kelvin), ' +
            'metric (c, celsius), or imperial (f, fahrenheit).'
        );
    });
});

describe('isUnitSystem', () => {
    it('accepts only the three canonical names', () => {
        expect(isUnitSystem('metric')).toBe(true);
        expect(isUnitSystem('celsius')).toBe(false);
        expect(isUnitSystem(undefined)).toBe(false);
    });
});

describe('conversions', () => {
    it('converts Kelvin to Fahrenheit with the 273 offset', () => {
        expect(convertTemperature(273, 'imperial')).toBe(32);
        expect(convertTemperature(283, 'imperial')).toBe(50);
    });

    it('converts Kelvin to Celsius with the 273.15 offset', () => {
        expect(convertTemperature(273.15, 'metric')).toBe(0);
    });

    it('passes Kelvin through for the standard system', () => {
        expect(convertTemperature(301.15, 'standard')).toBe(301.15);
    });

    it('converts meters/second to miles/hour only for imperial', () => {
        expect(convertSpeed(10, 'imperial')).toBeCloseTo(22.36936, 10);
        expect(convertSpeed(10, 'metric')).toBe(10);
        expect(convertSpeed(10, 'standard')).toBe(10);
    });
});

describe('labels', () => {
    it('labels temperatures', () => {
        expect(temperatureLabel('standard')).toBe('ºK');
        expect(temperatureLabel('metric')).toBe('ºC');
        expect(temperatureLabel('imperial')).toBe('ºF');
    });

    it('labels speeds', () => {
        expect(speedLabel('standard')).toBe('m/s');
        expect(speedLabel('metric')).toBe('m/s');
        expect(speedLabel('imperial')).toBe('MPH');
    });
});

describe('toOneDecimal', () => {
    it('rounds exact halves to the even tenth', () => {
        expect(toOneDecimal(4.25)).toBe('4.2');
        expect(toOneDecimal(4.75)).toBe('4.8');
        expect(toOneDecimal(1.75)).toBe('1.8');
        expect(toOneDecimal(273.25)).toBe('273.2');
        expect(toOneDecimal(-4.25)).toBe('-4.2');
    });

    it('rounds other values to the nearest tenth', () => {
        expect(toOneDecimal(4.12)).toBe('4.1');
        expect(toOneDecimal(9.21617632)).toBe('9.2');
        expect(toOneDecimal(301.15)).toBe('301.1');
        expect(toOneDecimal(38)).toBe('38.0');
        expect(toOneDecimal(4.5)).toBe('4.5');
    });
});
