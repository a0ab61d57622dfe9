import type { JsonObject } from "../core/json.js";
import type { StoreMode } from "../db/connection.js";

export function envSnapshot(runsDir: string, storeMode: StoreMode): JsonObject {
  return {
    node: process.version,
    platform: process.platform,
    store_mode: storeMode,
    runs_dir: runsDir
  };
}
