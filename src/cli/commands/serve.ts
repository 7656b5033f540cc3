import { Command } from 'commander';
import { createApp } from '../../app.js';
import { createHandler } from '../../server/router.js';
import { startServer } from '../../server/http.js';
import { ConfigManager } from '../../utils/config.js';
import { formatCliError, parsePositiveInt } from '../utils/validation.js';

interface ServeOptions {
  configPath?: string;
  host?: string;
  port?: number;
}

export function createServeCommand(): Command {
  return new Command('serve')
    .description('Start the HTTP API')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--host <host>', 'Interface to bind')
    .option('-p, --port <number>', 'Port to listen on', parsePositiveInt('Port', 65_535))
    .action(async (options: ServeOptions) => {
      try {
        await serve(options);
      } catch (error) {
        console.error(formatCliError(error));
        process.exit(1);
      }
    });
}

async function serve(options: ServeOptions): Promise<void> {
  const config = await new ConfigManager(options.configPath).load();
  const app = await createApp(config);

  const server = await startServer(createHandler(app), {
    host: options.host ?? config.server.host,
    port: options.port ?? config.server.port,
    logger: app.logger,
  });
  console.log(`🚀 ragrelay listening on ${server.url}`);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    app.logger.info('server.shutdown', { signal });

    server
      .close()
      .then(() => app.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error(formatCliError(error));
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
