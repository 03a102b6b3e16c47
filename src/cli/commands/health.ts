/**
 * Health Command
 *
 * Connectivity report for credentials, vector store and model discovery.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { HealthStatus } from '../../models/health-check.js';
import { output } from '../utils/output.js';
import { loadPipelineOrExit } from '../utils/pipeline-loader.js';

const STATUS_SYMBOLS: Record<HealthStatus, string> = {
  healthy: chalk.green('✓'),
  warning: chalk.yellow('⚠'),
  unhealthy: chalk.red('✗')
};

export function createHealthCommand(): Command {
  return new Command('health')
    .description('Check credentials and connectivity of every remote service')
    .action(async () => {
      const { healthChecker } = loadPipelineOrExit();
      const report = await healthChecker.checkHealth();

      if (output.isJson()) {
        output.json(report);
      } else {
        console.log(chalk.bold('\nTextbook Tutor Health\n'));
        for (const check of report.checks) {
          console.log(`${STATUS_SYMBOLS[check.status]} ${check.name}: ${check.message}`);
          if (check.details) {
            for (const [key, value] of Object.entries(check.details)) {
              const shown = typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
              console.log(chalk.dim(`  ${key}: ${shown}`));
            }
          }
        }
        console.log('');
        console.log(`${STATUS_SYMBOLS[report.overall]} ${chalk.bold(report.summary)}\n`);
      }

      if (report.overall === 'unhealthy') {
        process.exitCode = 1;
      }
    });
}
