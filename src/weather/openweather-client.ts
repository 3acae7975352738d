/**
 * OpenWeatherMap API Client
 * Fetches the 5-day/3-hour forecast for one location, limited to its first timestamp.
 * Documentation: https://openweathermap.org/forecast5
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { DEFAULT_API_HOST, DEFAULT_API_PATH, DEFAULT_TIMEOUT_MS } from '../config.js';
import { logger } from '../logger.js';
import { ConfigError, TransportError, WeatherError } from './errors.js';
import { formatForecast } from './forecast-formatter.js';
import { checkResponseStatus, parseForecastResponse } from './response-normalizer.js';
import { Conditions, DEFAULT_UNIT_SYSTEM, UnitSystem } from './types.js';
import { assertUnitSystem } from './units.js';
import { buildForecastUrl, createRequestSpec, redactApiKey } from './url-builder.js';

export interface WeatherClientConfig {
    readonly apiKey: string;
    readonly apiHost: string;
    readonly apiPath: string;
    readonly unitSystem: UnitSystem;
    readonly timeoutMs: number;
}

export interface WeatherClientOptions {
    apiKey: string;
    apiHost?: string;
    apiPath?: string;
    unitSystem?: UnitSystem;
    timeoutMs?: number;
}

/**
 * Build a validated, frozen client configuration. Omitted options take the
 * OpenWeatherMap defaults.
 */
export function createClientConfig(options: WeatherClientOptions): WeatherClientConfig {
    const {
        apiKey,
        apiHost = DEFAULT_API_HOST,
        apiPath = DEFAULT_API_PATH,
        unitSystem = DEFAULT_UNIT_SYSTEM,
        timeoutMs = DEFAULT_TIMEOUT_MS,
    } = options;

    if (apiKey.trim() === '') {
        throw new ConfigError('An OpenWeatherMap API key is required');
    }

    let protocol: string;
    try {
        protocol = new URL(apiHost).protocol;
    } catch (error) {
        throw new ConfigError(`API host "${apiHost}" is not a valid URL`, { cause: error });
    }
    if (protocol !== 'http:' && protocol !== 'https:') {
        throw new ConfigError(`API host "${apiHost}" must use http or https`);
    }
    if (apiHost.endsWith('/')) {
        throw new ConfigError(`API host "${apiHost}" must not end with a slash`);
    }

    if (!apiPath.startsWith('/')) {
        throw new ConfigError(`API path "${apiPath}" must start with a slash`);
    }

    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
        throw new ConfigError(`Request timeout ${timeoutMs}ms must be a positive number`);
    }

    return Object.freeze({
        apiKey,
        apiHost,
        apiPath,
        unitSystem: assertUnitSystem(unitSystem),
        timeoutMs,
    });
}

export class OpenWeatherClient {
    private client: AxiosInstance;
    readonly config: WeatherClientConfig;

    constructor(config: WeatherClientConfig, client?: AxiosInstance) {
        this.config = config;
        this.client = client ?? axios.create();
    }

    /**
     * Query the API once and normalize the first forecast timestamp
     */
    async getConditions(location: string): Promise<Conditions> {
        const { apiHost, apiPath, apiKey, unitSystem, timeoutMs } = this.config;

        try {
            const url = buildForecastUrl(createRequestSpec(apiHost, apiPath, apiKey, location, unitSystem));
            logger.debug('Requesting forecast', { url: redactApiKey(url) });
            const start = Date.now();

            let response: AxiosResponse<string>;
            try {
                response = await this.client.get<string>(url, {
                    timeout: timeoutMs,
                    responseType: 'text',
                    // Keep the raw body; status and JSON are checked below
                    transformResponse: [(data: string) => data],
                    validateStatus: () => true,
                });
            } catch (error) {
                throw new TransportError(error instanceof Error ? error.message : String(error), { cause: error });
            }

            logger.debug('Weather API responded', { status: response.status, latencyMs: Date.now() - start });

            const body = response.data ?? '';
            checkResponseStatus(response.status, body);
            return parseForecastResponse(body);
        } catch (error) {
            if (error instanceof WeatherError) {
                error.location = location;
                logger.debug('Failed to fetch OpenWeatherMap forecast', { location, code: error.code, error: error.message });
            }
            throw error;
        }
    }

    /**
     * Fetch and format the forecast for a location in the configured unit system
     */
    async forecast(location: string): Promise<string> {
        const conditions = await this.getConditions(location);
        return formatForecast(conditions, this.config.unitSystem);
    }
}
