/**
 * Encode command - Build instance details for a host and port
 */

import { Command } from 'commander';
import { createInstanceNet, encodeInstanceDetails, stringifyTdf } from 'redirector-wire';
import { formatBytes, formatInstanceDetails, parsePort } from '../format.js';

export const encodeCommand = new Command('encode')
  .description('Encode the instance details a redirector returns')
  .argument('<host>', 'Hostname or IPv4 address of the instance')
  .argument('<port>', 'Port of the instance')
  .option('-s, --secure', 'Instance requires a secure connection', false)
  .option('--base64', 'Print base64 instead of hex', false)
  .option('--dump', 'Also print the decoded field tree', false)
  .action((host: string, port: string, options: { secure: boolean; base64: boolean; dump: boolean }) => {
    const portNum = parsePort(port);
    if (portNum === undefined) {
      console.error('Invalid port number');
      process.exit(1);
    }

    const details = { net: createInstanceNet(host, portNum), secure: options.secure };
    const bytes = encodeInstanceDetails(details);

    console.log(`Encoding ${formatInstanceDetails(details)}`);
    console.log(formatBytes(bytes, options.base64 ? 'base64' : 'hex'));

    if (options.dump) {
      console.log('');
      console.log(stringifyTdf(bytes));
    }
  });
