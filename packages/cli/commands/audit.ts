import { Command } from 'commander';
import pc from 'picocolors';
import { loadConfigFromEnv, openConnection } from '../../runtime/index.js';
import { formatEvent, tailAuditEvents, type AuditFilters } from '../lib/auditLog.js';

interface TailOptions {
  db?: string;
  model?: string;
  type?: string;
  user?: string;
  limit: string;
  output: string;
}

function parseFilters(opts: TailOptions): AuditFilters {
  return {
    model: opts.model,
    type: opts.type,
    user: opts.user ? Number(opts.user) : undefined,
  };
}

export function registerAuditCommand(program: Command) {
  const audit = program.command('audit').description('Inspect the write audit trail');

  audit
    .command('tail')
    .description('Show the most recent audit entries')
    .option('--db <path>', 'SQLite database file (ignored when DATABASE_URL is set)')
    .option('--model <model>', 'Filter by model (post|comment)')
    .option('--type <type>', 'Filter by event type (e.g. comment.update)')
    .option('--user <user>', 'Filter by user id')
    .option('-n, --limit <limit>', 'Number of entries', '20')
    .option('-o, --output <output>', 'Output format: text|json', 'text')
    .action(async (opts: TailOptions) => {
      const config = loadConfigFromEnv();
      const db = openConnection({ databaseUrl: config.databaseUrl, sqliteFile: opts.db ?? config.sqliteFile });
      try {
        const entries = await tailAuditEvents(db, parseFilters(opts), { limit: Number(opts.limit) || 20 });
        if (opts.output === 'json') {
          console.log(JSON.stringify(entries, null, 2));
        } else if (!entries.length) {
          console.log(pc.yellow('No audit entries.'));
        } else {
          entries.forEach(entry => console.log(formatEvent(entry)));
        }
      } catch (error) {
        console.error(pc.red(`Audit query failed: ${error instanceof Error ? error.message : String(error)}`));
        process.exitCode = 1;
      } finally {
        await db.close();
      }
    });
}
