/**
 * Logger Test Suite
 *
 * - Documented LOG_LEVEL values
 * - Configured level on the shared logger
 */

import { describe, it, expect } from '@jest/globals';
import { LOG_LEVELS, logger } from '../logger.js';
import { config } from '../config.js';

describe('logger', () => {
    it('knows only the documented levels', () => {
        expect(LOG_LEVELS).toEqual(['error', 'warn', 'info', 'debug']);
    });

    it('maps every documented level onto a winston level', () => {
        for (const level of LOG_LEVELS) {
            expect(logger.levels[level]).toBeDefined();
        }
    });

    it('uses the configured level', () => {
        expect(logger.level).toBe(config.logLevel);
    });
});
