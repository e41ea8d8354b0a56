#!/usr/bin/env node
import { Command } from 'commander';
import { registerProjectCommands } from './commands/project';
import { registerApplicationCommands } from './commands/application';
import { registerOfficerCommands } from './commands/officer';
import { registerSystemCommands } from './commands/system';
import { registerConfigCommands } from './commands/config';

// Load environment variables
import 'dotenv/config';

const program = new Command();

program
  .name('flat-allocation')
  .description('Flat allocation CLI - applications, bookings and officer registrations')
  .version('1.0.0');

// Register command modules
registerProjectCommands(program);
registerApplicationCommands(program);
registerOfficerCommands(program);
registerSystemCommands(program);
registerConfigCommands(program);

// Parse and execute
program.parseAsync(process.argv).catch((error: Error) => {
  console.error('Error:', error.message);
  process.exit(1);
});
