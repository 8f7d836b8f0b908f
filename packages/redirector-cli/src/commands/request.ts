/**
 * Request command - Print the encoded GetServerInstance request
 */

import { Command } from 'commander';
import { encodeInstanceRequest, stringifyTdf } from 'redirector-wire';
import { formatBytes } from '../format.js';

export const requestCommand = new Command('request')
  .description('Print the encoded redirector instance request')
  .option('--base64', 'Print base64 instead of hex', false)
  .option('--dump', 'Also print the decoded field tree', false)
  .action((options: { base64: boolean; dump: boolean }) => {
    const bytes = encodeInstanceRequest();
    console.log(formatBytes(bytes, options.base64 ? 'base64' : 'hex'));

    if (options.dump) {
      console.log('');
      console.log(stringifyTdf(bytes));
    }
  });
