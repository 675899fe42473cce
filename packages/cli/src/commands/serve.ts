import { Command } from 'commander';
import { type CliOptions, openBindery, runAction } from '../context.js';

export const serveCommand = new Command('serve')
  .description('Start the Bindery HTTP API server')
  .option('-p, --port <port>', 'Server port')
  .option('-H, --host <host>', 'Server host')
  .option('-c, --config <path>', 'Config file path')
  .option('--repo <url>', 'Extension repository (overrides extensions.repository)')
  .action(async (options: CliOptions & { port?: string; host?: string }) => {
    await runAction(async () => {
      // Dynamic import to avoid loading server deps for the other commands
      const { startServer } = await import('@bindery/server');

      const server: { port?: number; host?: string } = {};
      if (options.port) server.port = parseInt(options.port, 10);
      if (options.host) server.host = options.host;

      const bindery = await openBindery(options, { server });
      const running = startServer(bindery);

      const shutdown = () => {
        console.log('\nShutting down...');
        running.close();
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
  });
