/**
 * Test setup file
 *
 * Silences the shared logger for every test file.
 */

import { configureLogger } from '../src/utils/logger.js';

configureLogger({ level: 'silent' });
