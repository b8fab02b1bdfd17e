/**
 * Walkthrough configuration — environment variables only.
 * Zones are validated at load.
 */

import path from "node:path";
import type { ZoneId } from "../domain/core.js";
import { resolveZone } from "../domain/zone.js";

export interface WalkthroughConfig {
  /** Directory the walkthrough writes its CSV/XLSX files to. */
  readonly dataDir: string;
  /** Zone the sample data is displayed and written in. */
  readonly localZone: ZoneId;
}

export const DEFAULT_DATA_DIR = "./dat";
export const DEFAULT_LOCAL_ZONE = "America/Chicago";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WalkthroughConfig {
  const dir = env.SHEETZONE_DATA_DIR ?? DEFAULT_DATA_DIR;
  return {
    dataDir: path.resolve(dir),
    localZone: resolveZone(env.SHEETZONE_LOCAL_ZONE ?? DEFAULT_LOCAL_ZONE),
  };
}
