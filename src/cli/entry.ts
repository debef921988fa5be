import { fileURLToPath } from "node:url";

import fse from "fs-extra";

/**
 * True when `argvEntry` (usually `process.argv[1]`) names the module at
 * `moduleUrl`. Symlinks such as npm's `node_modules/.bin` links are resolved
 * before comparing, and the URL is decoded so paths with spaces or `%` match.
 */
export function isEntryModule(moduleUrl: string, argvEntry: string | undefined): boolean {
  if (argvEntry === undefined || !fse.existsSync(argvEntry)) {
    return false;
  }

  return fse.realpathSync(argvEntry) === fse.realpathSync(fileURLToPath(moduleUrl));
}
