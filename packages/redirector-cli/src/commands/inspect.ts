/**
 * Inspect command - Dump any TDF payload
 */

import { Command } from 'commander';
import { DEFAULT_MAX_DEPTH, DEFAULT_MAX_LENGTH, hexToBytes, stringifyTdf } from 'redirector-wire';
import { describeError, parseCount } from '../format.js';

export const inspectCommand = new Command('inspect')
  .description('Print the field tree of any TDF payload')
  .argument('<hex>', 'Encoded payload')
  .option('--max-length <bytes>', 'Largest accepted string or list length', String(DEFAULT_MAX_LENGTH))
  .option('--max-depth <levels>', 'Deepest accepted nesting', String(DEFAULT_MAX_DEPTH))
  .action((hex: string, options: { maxLength: string; maxDepth: string }) => {
    const maxLength = parseCount(options.maxLength);
    if (maxLength === undefined) {
      console.error('Invalid --max-length');
      process.exit(1);
    }
    const maxDepth = parseCount(options.maxDepth);
    if (maxDepth === undefined) {
      console.error('Invalid --max-depth');
      process.exit(1);
    }

    try {
      console.log(stringifyTdf(hexToBytes(hex), { maxLength, maxDepth }));
    } catch (err) {
      console.error('Failed to read payload:', describeError(err));
      process.exit(1);
    }
  });
