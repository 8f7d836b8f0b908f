#!/usr/bin/env node
/**
 * Redirector wire CLI
 */

import { Command } from 'commander';
import { requestCommand } from './commands/request.js';
import { encodeCommand } from './commands/encode.js';
import { decodeCommand } from './commands/decode.js';
import { inspectCommand } from './commands/inspect.js';

const program = new Command();

program
  .name('redirector')
  .description('Encode and decode redirector instance payloads')
  .version('0.1.0');

program.addCommand(requestCommand);
program.addCommand(encodeCommand);
program.addCommand(decodeCommand);
program.addCommand(inspectCommand);

program.parse();
