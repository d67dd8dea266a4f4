// lib/dd.ts
import env from '../config/env';

/**
 * Debug log, silent unless ENABLE_LOGS is "true"
 */
export const ddl = (...args: unknown[]): void => {
    if (env.ENABLE_LOGS === 'true') {
        console.log(...args);
    }
};
