// CHANGE: Derive the child environment from the launcher's own.
// WHY: The live program resolves its local modules through the search-path variable.

import { SEARCH_PATH } from "./config.js";

/**
 * Build the child environment: a copy of the parent with the search-path
 * variable set to the working directory. The parent object is left untouched.
 */
export function buildChildEnv(workingDirectory: string, parentEnv: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  return {
    ...parentEnv,
    [SEARCH_PATH.VARIABLE]: workingDirectory
  };
}
