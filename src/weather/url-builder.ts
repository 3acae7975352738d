import { RequestSpec, UnitSystem } from './types.js';

function isUnreserved(byte: number): boolean {
    return (byte >= 0x30 && byte <= 0x39) // 0-9
        || (byte >= 0x41 && byte <= 0x5a) // A-Z
        || (byte >= 0x61 && byte <= 0x7a) // a-z
        || byte === 0x2d || byte === 0x2e || byte === 0x5f || byte === 0x7e; // - . _ ~
}

/**
 * Escape a value for a URL query, form-encoding style, over its UTF-8 bytes:
 * spaces become `+`, everything but `A-Za-z0-9-_.~` is percent-encoded.
 * Lone surrogates encode as U+FFFD, so this never throws.
 */
export function queryEscape(value: string): string {
    let escaped = '';
    for (const byte of Buffer.from(value, 'utf8')) {
        if (byte === 0x20) {
            escaped += '+';
        } else if (isUnreserved(byte)) {
            escaped += String.fromCharCode(byte);
        } else {
            escaped += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
        }
    }
    return escaped;
}

export function createRequestSpec(
    apiHost: string,
    apiPath: string,
    apiKey: string,
    location: string,
    unitSystem: UnitSystem
): RequestSpec {
    return Object.freeze({ apiHost, apiPath, apiKey, location, unitSystem, count: 1 });
}

/**
 * Form the forecast URL. Parameter order is fixed: q, appid, units, cnt.
 * `units` is left out for the standard system, which is the API default
 * and not an accepted value.
 */
export function buildForecastUrl(spec: RequestSpec): string {
    const params = [
        `q=${queryEscape(spec.location)}`,
        `appid=${queryEscape(spec.apiKey)}`,
    ];
    if (spec.unitSystem !== 'standard') {
        params.push(`units=${spec.unitSystem}`);
    }
    params.push(`cnt=${spec.count}`);

    return `${spec.apiHost}${spec.apiPath}/?${params.join('&')}`;
}

/**
 * Hide the API key in a URL before it is logged
 */
export function redactApiKey(url: string): string {
    return url.replace(/([?&]appid=)[^&]*/, '$1REDACTED');
}
