/**
 * Forecast data types shared by the URL builder, normalizer and formatter
 */

/**
 * standard: Kelvin, meters/second (the API's own units)
 * metric:   Celsius, meters/second
 * imperial: Fahrenheit, miles/hour
 */
export type UnitSystem = 'standard' | 'metric' | 'imperial';

export const UNIT_SYSTEMS: readonly UnitSystem[] = ['standard', 'metric', 'imperial'];

export const DEFAULT_UNIT_SYSTEM: UnitSystem = 'imperial';

/**
 * Everything needed to form one forecast request URL
 */
export interface RequestSpec {
    readonly apiHost: string;
    readonly apiPath: string;
    readonly apiKey: string;
    readonly location: string;
    readonly unitSystem: UnitSystem;
    readonly count: 1; // Forecast timestamps to return
}

/**
 * API-agnostic conditions for one forecast timestamp.
 * Numeric fields stay in the API's base units and are absent, not zero,
 * when the API omits them.
 */
export interface Conditions {
    readonly description: string;
    readonly temperature?: number; // Kelvin
    readonly feelsLike?: number; // Kelvin
    readonly humidity?: number; // 0-100
    readonly windSpeed?: number; // meters/second
}

/**
 * Fields read from the OpenWeatherMap `/data/2.5/forecast` response.
 * This does not fully mirror the API, and every field may be missing.
 */
export interface OWMForecastResponse {
    list?: Array<{
        weather?: Array<{ description?: string | null }> | null;
        main?: {
            temp?: number | null;
            feels_like?: number | null;
            humidity?: number | null;
        } | null;
        wind?: { speed?: number | null } | null;
    } | null> | null;
}
