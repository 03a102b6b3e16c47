import { Command } from 'commander';
import chalk from 'chalk';
import { candidateLabel } from '../../models/model-candidate.js';
import { output } from '../utils/output.js';
import { loadPipelineOrExit } from '../utils/pipeline-loader.js';

/**
 * Create the models command
 *
 * Prints the candidate order the next query would try.
 */
export function createModelsCommand(): Command {
  return new Command('models')
    .description('Show the resolved model candidate order')
    .action(async () => {
      const { config, resolver } = loadPipelineOrExit();
      const { candidates, source } = await resolver.resolve();
      const labels = candidates.map(candidateLabel);

      if (output.isJson()) {
        output.json({ mode: config.generation.mode, source, candidates: labels });
        return;
      }

      console.log(chalk.bold(`\nModel candidates (${config.generation.mode} mode, from ${source})\n`));
      if (labels.length === 0) {
        output.warning('No candidates available; every question will fail generation');
        return;
      }
      output.list(labels, true);
      console.log('');
    });
}
