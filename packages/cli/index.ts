#!/usr/bin/env node
import { Command } from 'commander';
import { registerAuditCommand } from './commands/audit.js';
import { registerMigrateCommand } from './commands/migrate.js';
import { registerServeCommand } from './commands/serve.js';

const program = new Command();

program
  .name('postgate')
  .description('postgate CLI - posts and comments API with author and staff access rules')
  .version('0.1.0');

registerServeCommand(program);
registerMigrateCommand(program);
registerAuditCommand(program);

await program.parseAsync(process.argv);
