import dotenv from 'dotenv';

dotenv.config();

export type Env = Record<string, string | undefined>;

export interface Config {
    // OpenWeatherMap
    openWeatherApiKey: string;
    apiHost: string;
    apiPath: string;
    requestTimeoutMs: number;

    // CLI defaults
    location: string;
    units: string;

    // Logging
    logLevel: string;
    logDir: string;
}

export const DEFAULT_API_HOST = 'https://api.openweathermap.org';
export const DEFAULT_API_PATH = '/data/2.5/forecast';
export const DEFAULT_TIMEOUT_MS = 3000;

function getEnvVarOptional(env: Env, name: string, defaultValue: string): string {
    return env[name] || defaultValue;
}

export function getEnvVarNumber(env: Env, name: string, defaultValue: number): number {
    const value = env[name];
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    if (isNaN(parsed)) return defaultValue;
    return parsed;
}

export function loadConfig(env: Env): Config {
    return {
        openWeatherApiKey: getEnvVarOptional(env, 'OPENWEATHERMAP_API_KEY', ''),
        apiHost: getEnvVarOptional(env, 'WEATHERCASTER_API_HOST', DEFAULT_API_HOST),
        apiPath: getEnvVarOptional(env, 'WEATHERCASTER_API_PATH', DEFAULT_API_PATH),
        requestTimeoutMs: getEnvVarNumber(env, 'WEATHERCASTER_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),

        location: getEnvVarOptional(env, 'WEATHERCASTER_LOCATION', ''),
        units: getEnvVarOptional(env, 'WEATHERCASTER_UNITS', ''),

        // Default to 'warn'; raise to 'debug' to see request URLs
        logLevel: getEnvVarOptional(env, 'LOG_LEVEL', 'warn'),
        logDir: getEnvVarOptional(env, 'LOG_DIR', ''),
    };
}

export const config: Config = loadConfig(process.env);
