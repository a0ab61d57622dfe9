/** JSONB column and tool payload objects; values are whatever JSON.parse can produce. */
export type JsonObject = Record<string, unknown>;
