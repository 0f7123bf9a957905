/**
 * Loaded by mocha before the suites: keep test output to errors
 */

import { setGlobalLogLevel } from './utils/logger';

setGlobalLogLevel('error');
