/**
 * Decode command - Read instance details from a redirector response
 */

import { Command } from 'commander';
import { decodeInstanceDetails, hexToBytes, stringifyTdf } from 'redirector-wire';
import { describeError, formatInstanceDetails } from '../format.js';

export const decodeCommand = new Command('decode')
  .description('Decode instance details from hex')
  .argument('<hex>', 'Encoded instance details')
  .option('--dump', 'Also print the decoded field tree', false)
  .action((hex: string, options: { dump: boolean }) => {
    try {
      const bytes = hexToBytes(hex);
      console.log(formatInstanceDetails(decodeInstanceDetails(bytes)));

      if (options.dump) {
        console.log('');
        console.log(stringifyTdf(bytes));
      }
    } catch (err) {
      console.error('Failed to decode instance details:', describeError(err));
      process.exit(1);
    }
  });
