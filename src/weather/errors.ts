/**
 * Error taxonomy for the forecast pipeline.
 * Every failure the client or CLI can raise is a WeatherError subclass,
 * discriminated by `code`.
 */

export type WeatherErrorCode =
    | 'TRANSPORT'
    | 'UPSTREAM_STATUS'
    | 'DECODE'
    | 'MALFORMED_RESPONSE'
    | 'INVALID_UNIT_SYSTEM'
    | 'CONFIG';

export abstract class WeatherError extends Error {
    abstract readonly code: WeatherErrorCode;

    /**
     * Location the failing request was made for, set by the client
     * once the error leaves the pipeline.
     */
    location?: string;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The host could not be reached or the connection failed before any
 * HTTP response arrived. The message is the transport's own.
 */
export class TransportError extends WeatherError {
    readonly code = 'TRANSPORT';
}

export class UpstreamStatusError extends WeatherError {
    readonly code = 'UPSTREAM_STATUS';

    constructor(
        readonly status: number,
        readonly body: string
    ) {
        super(`HTTP ${status} returned from weather API: ${body}`);
    }
}

export class DecodeError extends WeatherError {
    readonly code = 'DECODE';
}

/**
 * The payload decoded but lacks the entries a forecast needs
 * (an empty `list`, an empty `weather`, or no description).
 */
export class MalformedResponseError extends WeatherError {
    readonly code = 'MALFORMED_RESPONSE';
}

export class InvalidUnitSystemError extends WeatherError {
    readonly code = 'INVALID_UNIT_SYSTEM';

    constructor(readonly value: string) {
        super(
            `Unit system "${value}" is invalid, please specify one of standard (k, kelvin), ` +
            `metric (c, celsius), or imperial (f, fahrenheit).`
        );
    }
}

export class ConfigError extends WeatherError {
    readonly code = 'CONFIG';
}
