/**
 * Student Provisioning - Environment Helpers
 *
 * All configuration is injected through environment variables. Each
 * package builds its own cached config object from these helpers.
 */

/**
 * Validates that a required environment variable is present.
 * @throws Error if the variable is missing
 */
export function requireEnv(name: string): string {
    const value = process.env[name];
    if (!value) {
        throw new Error(`Missing required environment variable: ${name}`);
    }
    return value;
}

/**
 * Gets an optional environment variable with a default value.
 */
export function optionalEnv(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}

/**
 * Gets an optional numeric environment variable with a default value.
 */
export function optionalNumericEnv(name: string, defaultValue: number): number {
    const value = process.env[name];
    if (!value) {
        return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid numeric value for ${name}: ${value}`);
    }
    return parsed;
}
