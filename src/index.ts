/**
 * Backend entry point.
 */
import { config } from './config';
import { start, reportStartupFailure } from './server';

const serverPromise = start(config).catch(reportStartupFailure);

export default serverPromise;
