/**
 * Shared test helpers
 */

export { createTempDir, removeDir, makeDirs, withTempDir, withTempParams } from "./fs.js";
