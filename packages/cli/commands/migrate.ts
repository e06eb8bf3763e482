import { Command } from 'commander';
import pc from 'picocolors';
import { loadConfigFromEnv, migrate, openConnection } from '../../runtime/index.js';

export function registerMigrateCommand(program: Command) {
  program
    .command('migrate')
    .description('Create the users, posts, comments and audit_log tables if missing')
    .option('--db <path>', 'SQLite database file (ignored when DATABASE_URL is set)')
    .action(async (options: { db?: string }) => {
      const config = loadConfigFromEnv();
      const db = openConnection({
        databaseUrl: config.databaseUrl,
        sqliteFile: options.db ?? config.sqliteFile,
      });
      try {
        await migrate(db);
        console.log(pc.green(`Schema ready (${db.dialect}).`));
      } catch (error) {
        console.error(pc.red(`Migration failed: ${error instanceof Error ? error.message : String(error)}`));
        process.exitCode = 1;
      } finally {
        await db.close();
      }
    });
}
