/**
 * Version information for hdl-regress.
 */

import { createRequire } from "node:module";

// src/ when run from sources, dist/src/ once built
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"];

/** Current version, read from package.json. */
export const VERSION = (() => {
  const require = createRequire(import.meta.url);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    let pkg: unknown;
    try {
      pkg = require(candidate);
    } catch {
      continue;
    }
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  }
  return "0.0.0-dev";
})();

/** Name of the installed command. */
export const BINARY_NAME = "hdl-regress";
