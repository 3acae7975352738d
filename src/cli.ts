/**
 * Command-line front end: resolves flags and environment into a client
 * configuration, runs one forecast and writes it to the output stream.
 */

import { AxiosInstance } from 'axios';
import { Env, loadConfig } from './config.js';
import { logger } from './logger.js';
import { ConfigError, WeatherError } from './weather/errors.js';
import { OpenWeatherClient, createClientConfig } from './weather/openweather-client.js';
import { parseUnitSystem } from './weather/units.js';

export interface OutputStream {
    write(chunk: string): unknown;
}

interface CliOptions {
    location: string;
    units: string;
    help: boolean;
}

export const USAGE = `Usage: weathercaster [-l location] [-u units]

Prints a brief weather forecast from OpenWeatherMap.org.

Options:
  -l, --location <location>  The location for which you want a forecast. Also set via
                             the WEATHERCASTER_LOCATION environment variable.
                             A location can be "Name" (for well-known places such as London),
                             "Name,Region" or "Name,Region,CountryCode", e.g. "Great Neck Plaza,NY,US".
  -u, --units <units>        standard (k, kelvin), metric (c, celsius) or imperial (f, fahrenheit).
                             Also set via WEATHERCASTER_UNITS. The default is imperial.
  -h, --help                 Show this message.

The OPENWEATHERMAP_API_KEY environment variable must hold an OpenWeatherMap API key.
To obtain an API key, see https://home.openweathermap.org/api_keys
`;

function parseArgs(args: string[]): CliOptions {
    const options: CliOptions = { location: '', units: '', help: false };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const eq = arg.indexOf('=');
        const name = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg;
        const inlineValue = arg.startsWith('--') && eq !== -1 ? arg.slice(eq + 1) : undefined;

        const takeValue = (): string => {
            if (inlineValue !== undefined) return inlineValue;
            const next = args[i + 1];
            if (next === undefined) {
                throw new ConfigError(`Flag ${name} requires a value`);
            }
            i++;
            return next;
        };

        switch (name) {
            case '-l':
            case '--location':
                options.location = takeValue();
                break;
            case '-u':
            case '--units':
                options.units = takeValue();
                break;
            case '-h':
            case '--help':
                options.help = true;
                break;
            default:
                throw new ConfigError(`Unknown argument "${arg}"\n\n${USAGE}`);
        }
    }

    return options;
}

/**
 * Run the CLI with arguments (without the node and script paths) and an
 * environment map. Flags take precedence over environment variables.
 */
export async function runCli(
    args: string[],
    env: Env,
    output: OutputStream,
    httpClient?: AxiosInstance
): Promise<void> {
    const options = parseArgs(args);
    if (options.help) {
        output.write(USAGE);
        return;
    }

    const settings = loadConfig(env);

    if (!settings.openWeatherApiKey) {
        throw new ConfigError(
            'Please set the OPENWEATHERMAP_API_KEY environment variable to an OpenWeatherMap API key.\n' +
            'To obtain an API key, see https://home.openweathermap.org/api_keys'
        );
    }

    const location = options.location || settings.location;
    if (!location) {
        throw new ConfigError(
            'Please specify a location using either the -l command-line flag, ' +
            'or by setting the WEATHERCASTER_LOCATION environment variable.'
        );
    }

    const unitSystem = parseUnitSystem(options.units || settings.units);

    const client = new OpenWeatherClient(
        createClientConfig({
            apiKey: settings.openWeatherApiKey,
            apiHost: settings.apiHost,
            apiPath: settings.apiPath,
            unitSystem,
            timeoutMs: settings.requestTimeoutMs,
        }),
        httpClient
    );

    logger.debug('Fetching forecast', { location, unitSystem });
    const forecast = await client.forecast(location);
    output.write(`${forecast}\n`);
}

/**
 * Render an error as the single line shown to the user
 */
export function describeError(error: unknown): string {
    if (error instanceof WeatherError && error.location !== undefined) {
        return `Error querying weather API for location "${error.location}": ${error.message}`;
    }
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
