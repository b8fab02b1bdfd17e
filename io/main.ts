/**
 * Walkthrough entry point. Configuration from the environment (see config.ts).
 */

import { loadConfig } from "./config.js";
import { FileTableStore } from "./fileTableStore.js";
import { runWalkthrough } from "./walkthrough.js";

const config = loadConfig();
const store = new FileTableStore(config.dataDir);

console.info(`Writing files to ${config.dataDir} (local zone ${config.localZone})`);
await runWalkthrough(store, config);
