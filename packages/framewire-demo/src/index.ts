#!/usr/bin/env node
/**
 * framewire demo CLI
 */

import { Command } from 'commander';
import { sendCommand } from './commands/send.js';
import { receiveCommand } from './commands/receive.js';
import { loopbackCommand } from './commands/loopback.js';

const program = new Command();

program
  .name('framewire-demo')
  .description('framewire demo CLI - stream H.264 units over length-prefixed TCP')
  .version('0.1.0');

program.addCommand(sendCommand);
program.addCommand(receiveCommand);
program.addCommand(loopbackCommand);

program.parse();
