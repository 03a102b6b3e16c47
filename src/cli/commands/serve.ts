import { Command } from 'commander';
import chalk from 'chalk';
import { createApp, startServer, stopServer } from '../../server/http-server.js';
import { logger } from '../utils/logger.js';
import { loadPipelineOrExit } from '../utils/pipeline-loader.js';

interface ServeOptions {
  port?: string;
}

/**
 * Create the serve command
 *
 * Starts the HTTP server answering chat requests. Status lines go to stderr.
 */
export function createServeCommand(): Command {
  const command = new Command('serve');

  command
    .description('Start the HTTP tutor API')
    .option('-p, --port <port>', 'Port to listen on (defaults to PORT or 8000)')
    .action(async (options: ServeOptions) => {
      const pipeline = loadPipelineOrExit();
      const { config } = pipeline;

      const port = options.port !== undefined ? Number(options.port) : config.server.port;
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        process.stderr.write(chalk.red(`\n❌ Invalid port: ${options.port}\n\n`));
        process.exit(1);
      }

      try {
        const app = createApp({
          orchestrator: pipeline.orchestrator,
          healthChecker: pipeline.healthChecker,
          corsOrigin: config.server.corsOrigin,
          logger
        });
        const server = await startServer(app, port, logger);

        process.stderr.write(chalk.green(`✓ Tutor API listening on port ${port}\n`));
        process.stderr.write(chalk.gray(`  Models: ${config.generation.mode} mode\n`));
        process.stderr.write(
          config.apiKey
            ? chalk.gray('  AI key: configured\n')
            : chalk.yellow('  AI key: missing (chat requests will return an error message)\n')
        );
        process.stderr.write(
          config.vectorStore.url
            ? chalk.gray(`  Vector store: ${config.vectorStore.url} (${config.vectorStore.collection})\n`)
            : chalk.yellow('  Vector store: disabled\n')
        );

        const shutdown = (signal: string): void => {
          logger.info('Shutting down HTTP server', { signal });
          stopServer(server).then(
            () => process.exit(0),
            (error: unknown) => {
              logger.error('HTTP server did not close cleanly', error);
              process.exit(1);
            }
          );
        };
        process.once('SIGINT', () => shutdown('SIGINT'));
        process.once('SIGTERM', () => shutdown('SIGTERM'));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        process.stderr.write(chalk.red(`\n❌ Failed to start HTTP server: ${message}\n\n`));
        process.exit(1);
      }
    });

  return command;
}
