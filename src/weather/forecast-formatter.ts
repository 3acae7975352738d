import { Conditions, UnitSystem } from './types.js';
import { convertSpeed, convertTemperature, speedLabel, temperatureLabel, toOneDecimal } from './units.js';

/**
 * Render conditions as a one-line summary in the given unit system, e.g.
 * `clear sky, temp 82.7 ºF, feels like 80.6 ºF, humidity 38.0%, wind 9.2 MPH`.
 * A clause is left out entirely when its field is absent.
 */
export function formatForecast(conditions: Conditions, unitSystem: UnitSystem): string {
    const tempUnit = temperatureLabel(unitSystem);
    const speedUnit = speedLabel(unitSystem);
    const clauses = [conditions.description];

    if (conditions.temperature !== undefined) {
        clauses.push(`temp ${toOneDecimal(convertTemperature(conditions.temperature, unitSystem))} ${tempUnit}`);
    }

    if (conditions.feelsLike !== undefined) {
        clauses.push(`feels like ${toOneDecimal(convertTemperature(conditions.feelsLike, unitSystem))} ${tempUnit}`);
    }

    if (conditions.humidity !== undefined) {
        clauses.push(`humidity ${toOneDecimal(conditions.humidity)}%`);
    }

    if (conditions.windSpeed !== undefined) {
        clauses.push(`wind ${toOneDecimal(convertSpeed(conditions.windSpeed, unitSystem))} ${speedUnit}`);
    }

    return clauses.join(', ');
}
