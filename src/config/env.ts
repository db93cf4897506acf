/**
 * Environment Configuration
 * Validates and exports the credentials of the task table.
 * Fails fast at startup if required variables are missing.
 */

/** Supabase configuration */
export const SUPABASE_URL = getRequiredEnv("SUPABASE_URL");
export const SUPABASE_SERVICE_ROLE_KEY = getRequiredEnv("SUPABASE_SERVICE_ROLE_KEY");

/** Table holding one row per tracked video */
export const TASKS_TABLE = process.env.TASKS_TABLE || "download_tasks";

/**
 * Helper to safely retrieve required environment variables.
 * Throws immediately if variable is missing.
 */
function getRequiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}
