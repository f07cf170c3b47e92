/**
 * Reads a per-service endpoint override from the environment.
 * Returns undefined when the variable is unset or empty, so the SDK falls back to its own endpoint resolution.
 */
export const resolveEndpoint = (envVar: string | undefined): string | undefined => {
    if (!envVar) return undefined;
    return process.env[envVar] || undefined;
};
