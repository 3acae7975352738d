/**
 * Response normalizer for the OpenWeatherMap `/forecast` payload.
 * Decodes the JSON, checks the shape of the fields it reads, and reduces
 * the first timestamp to Conditions. Unknown fields are ignored.
 */

import { DecodeError, MalformedResponseError, UpstreamStatusError } from './errors.js';
import { Conditions, OWMForecastResponse } from './types.js';

type JsonObject = Record<string, unknown>;
type ForecastEntry = NonNullable<NonNullable<OWMForecastResponse['list']>[number]>;
type WeatherEntry = NonNullable<ForecastEntry['weather']>[number];

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalObject(value: unknown, field: string): JsonObject | null {
    if (value === undefined || value === null) return null;
    if (!isObject(value)) {
        throw new DecodeError(`cannot decode field "${field}": expected an object`);
    }
    return value;
}

function optionalArray(value: unknown, field: string): unknown[] | null {
    if (value === undefined || value === null) return null;
    if (!Array.isArray(value)) {
        throw new DecodeError(`cannot decode field "${field}": expected an array`);
    }
    return value;
}

function optionalNumber(value: unknown, field: string): number | null {
    if (value === undefined || value === null) return null;
    if (typeof value !== 'number') {
        throw new DecodeError(`cannot decode field "${field}": expected a number`);
    }
    return value;
}

function optionalString(value: unknown, field: string): string | null {
    if (value === undefined || value === null) return null;
    if (typeof value !== 'string') {
        throw new DecodeError(`cannot decode field "${field}": expected a string`);
    }
    return value;
}

function decodeWeather(value: unknown, field: string): WeatherEntry {
    const weather = optionalObject(value, field);
    return { description: optionalString(weather?.description, `${field}.description`) };
}

function decodeEntry(value: unknown, field: string): ForecastEntry | null {
    const entry = optionalObject(value, field);
    if (!entry) return null;

    const weather = optionalArray(entry.weather, `${field}.weather`);
    const main = optionalObject(entry.main, `${field}.main`);
    const wind = optionalObject(entry.wind, `${field}.wind`);

    return {
        weather: weather?.map((w, i) => decodeWeather(w, `${field}.weather[${i}]`)) ?? null,
        main: main && {
            temp: optionalNumber(main.temp, `${field}.main.temp`),
            feels_like: optionalNumber(main.feels_like, `${field}.main.feels_like`),
            humidity: optionalNumber(main.humidity, `${field}.main.humidity`),
        },
        wind: wind && {
            speed: optionalNumber(wind.speed, `${field}.wind.speed`),
        },
    };
}

/**
 * Decode a raw payload into the typed response shape.
 * Throws DecodeError for invalid JSON or a field of the wrong JSON type.
 */
export function decodeForecastResponse(raw: string | Uint8Array): OWMForecastResponse {
    const text = typeof raw === 'string' ? raw : Buffer.from(raw).toString('utf8');

    let document: unknown;
    try {
        document = JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new DecodeError(`invalid JSON from weather API: ${reason}`, { cause: error });
    }

    // A JSON null decodes to an empty response
    if (document === null) return {};
    if (!isObject(document)) {
        throw new DecodeError('cannot decode weather API response: expected a JSON object');
    }

    const list = optionalArray(document.list, 'list');
    return {
        list: list?.map((entry, i) => decodeEntry(entry, `list[${i}]`)) ?? null,
    };
}

/**
 * Reduce a decoded response to the conditions of its first timestamp.
 * Throws MalformedResponseError when `list`, its first `weather`, or that
 * entry's description is empty or missing.
 */
export function toConditions(response: OWMForecastResponse): Conditions {
    const list = response.list ?? [];
    if (list.length === 0) {
        throw new MalformedResponseError('unexpected empty `list` from weather API');
    }

    // Only the first timestamp is used; cnt=1 asks for no more
    const first = list[0];
    const weather = first?.weather?.[0];
    if (!first || !weather) {
        throw new MalformedResponseError('unexpected empty `list[0].weather` from weather API');
    }

    const description = weather.description;
    if (description === undefined || description === null) {
        throw new MalformedResponseError('missing `list[0].weather[0].description` from weather API');
    }

    const conditions: { -readonly [K in keyof Conditions]: Conditions[K] } = { description };
    const temperature = first.main?.temp;
    const feelsLike = first.main?.feels_like;
    const humidity = first.main?.humidity;
    const windSpeed = first.wind?.speed;

    if (temperature != null) conditions.temperature = temperature;
    if (feelsLike != null) conditions.feelsLike = feelsLike;
    if (humidity != null) conditions.humidity = humidity;
    if (windSpeed != null) conditions.windSpeed = windSpeed;

    return Object.freeze(conditions);
}

export function parseForecastResponse(raw: string | Uint8Array): Conditions {
    return toConditions(decodeForecastResponse(raw));
}

/**
 * Reject any non-2xx status before the body is parsed.
 */
export function checkResponseStatus(status: number, body: string): void {
    if (status < 200 || status >= 300) {
        throw new UpstreamStatusError(status, body);
    }
}
