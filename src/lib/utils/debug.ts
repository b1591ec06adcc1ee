import { DEBUG } from "../../config";

/**
 * Scoped debug logger, silent unless CONSULTA_DEBUG is set.
 */
export function createDebugLog(scope: string) {
  return (...args: unknown[]) => {
    if (DEBUG) console.log(`[${scope}]`, ...args);
  };
}
