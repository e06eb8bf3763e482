import { Command } from 'commander';
import pc from 'picocolors';
import { buildServer, loadConfigFromEnv, migrate, openConnection } from '../../runtime/index.js';

export function registerServeCommand(program: Command) {
  program
    .command('serve')
    .description('Start the posts and comments API')
    .option('-p, --port <port>', 'Port to listen on (defaults to PORT or 3001)')
    .option('--host <host>', 'Interface to bind (defaults to HOST or 0.0.0.0)')
    .action(async (options: { port?: string; host?: string }) => {
      const config = loadConfigFromEnv();
      const port = options.port ? Number(options.port) : config.port;
      const host = options.host ?? config.host;

      const db = openConnection({ databaseUrl: config.databaseUrl, sqliteFile: config.sqliteFile });
      try {
        await migrate(db);
        const server = await buildServer({
          db,
          auth: config.auth,
          log: { level: config.logLevel, pretty: config.logPretty },
          corsOrigins: config.corsOrigins,
          auditLogFile: config.auditLogFile,
        });

        const shutdown = async (signal: string) => {
          server.log.info(`Received ${signal}, shutting down`);
          await server.close();
          await db.close();
        };
        const onSignal = (signal: NodeJS.Signals) => {
          shutdown(signal).catch(err => {
            console.error(pc.red(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`));
            process.exitCode = 1;
          });
        };
        process.once('SIGINT', onSignal);
        process.once('SIGTERM', onSignal);

        await server.listen({ port, host });
        console.log(pc.green(`\npostgate listening on http://${host}:${port}`));
        console.log('   GET/POST              /posts/');
        console.log('   GET/PUT/PATCH/DELETE  /posts/:id/');
        console.log('   POST                  /comments/');
        console.log('   GET/PUT/PATCH/DELETE  /comments/:id/\n');
      } catch (error) {
        console.error(pc.red(`Server failed to start: ${error instanceof Error ? error.message : String(error)}`));
        await db.close();
        process.exitCode = 1;
      }
    });
}
