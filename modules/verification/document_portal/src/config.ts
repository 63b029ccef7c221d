/**
 * Student Provisioning - Document Portal Configuration
 *
 * Centralized environment configuration with validation.
 * Configuration is cached after first load for Lambda warm starts.
 */

import { optionalEnv, optionalNumericEnv, requireEnv } from '@provisioner/shared';
import type { PortalEnvConfig } from './types';

const DEFAULTS = {
    TARGET_PROGRAM: 'Ciência da Computação',
    TIMEOUT_MS: 15000,
} as const;

let portalConfigCache: PortalEnvConfig | null = null;

export function getPortalConfig(): PortalEnvConfig {
    if (portalConfigCache) {
        return portalConfigCache;
    }

    portalConfigCache = {
        formUrl: requireEnv('PORTAL_FORM_URL'),
        submitUrl: requireEnv('PORTAL_SUBMIT_URL'),
        targetProgram: optionalEnv('PORTAL_TARGET_PROGRAM', DEFAULTS.TARGET_PROGRAM),
        timeoutMs: optionalNumericEnv('PORTAL_TIMEOUT_MS', DEFAULTS.TIMEOUT_MS),
    };

    return portalConfigCache;
}

/**
 * Clear configuration cache (useful for testing).
 */
export function clearConfigCache(): void {
    portalConfigCache = null;
}
