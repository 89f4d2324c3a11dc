import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { log } from './logger.js';
import { describeError } from '../errors/syncErrors.js';

/**
 * True when the module at moduleUrl is the script node was started with.
 *
 * npm installs the bin as a symlink, so the started path is resolved
 * before comparing.
 */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) {
    return false;
  }

  let resolved: string;
  try {
    resolved = realpathSync(scriptPath);
  } catch (error) {
    log.debug(`[ENTRY] Cannot resolve ${scriptPath}: ${describeError(error)}`);
    return false;
  }

  return resolved === realpathSync(fileURLToPath(moduleUrl));
}
