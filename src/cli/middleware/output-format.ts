/**
 * Shared CLI middleware for resolving output format from --human/--json/--quiet flags.
 */

import { TasklaneError } from '../../core/errors.js';
import type { OutputFormat } from '../../types/config.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { FlagResolution } from '../format-context.js';

/**
 * Resolve output format from Commander.js option values.
 *
 * An explicit flag wins over the configured default (`output.defaultFormat`).
 *
 * @param opts - Commander.js parsed global options
 * @param configDefault - Format from the resolved configuration, if any
 */
export function resolveFormat(
  opts: { json?: boolean; human?: boolean; quiet?: boolean },
  configDefault?: OutputFormat,
): FlagResolution {
  const quiet = opts.quiet === true;
  if (opts.json === true && opts.human === true) {
    throw new TasklaneError(ExitCode.INVALID_INPUT, '--json and --human cannot be combined');
  }
  if (opts.json === true) return { format: 'json', source: 'flag', quiet };
  if (opts.human === true) return { format: 'human', source: 'flag', quiet };
  if (configDefault) return { format: configDefault, source: 'config', quiet };
  return { format: 'json', source: 'default', quiet };
}
