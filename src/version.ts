/**
 * Version tracking for jwt-bearer-auth
 */

// Package version from package.json
export const VERSION = '0.1.0';

export function getVersionInfo() {
    return {
        name: 'jwt-bearer-auth',
        version: VERSION,
    };
}
