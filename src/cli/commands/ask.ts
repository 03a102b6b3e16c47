import { Command } from 'commander';
import chalk from 'chalk';
import { output } from '../utils/output.js';
import { loadPipelineOrExit } from '../utils/pipeline-loader.js';

interface AskOptions {
  details?: boolean;
}

/**
 * Create the ask command
 *
 * Runs one question through the full pipeline and prints the answer.
 */
export function createAskCommand(): Command {
  return new Command('ask')
    .description('Ask the tutor a single question')
    .argument('<question>', 'Question to answer')
    .option('-d, --details', 'Also print retrieved passages and failed model candidates')
    .action(async (question: string, options: AskOptions) => {
      const { orchestrator } = loadPipelineOrExit();
      const result = await orchestrator.answerDetailed(question);

      if (output.isJson()) {
        output.json(
          options.details
            ? result
            : { response: result.response, model: result.model }
        );
        return;
      }

      console.log(result.response);

      if (!options.details) return;

      console.log('');
      console.log(chalk.bold('Model:') + ' ' + (result.model ?? chalk.red('none')));
      if (result.candidateSource) {
        console.log(chalk.dim(`  Candidates from ${result.candidateSource}`));
      }

      console.log(chalk.bold(`Passages (${result.passages.length}):`));
      for (const [rank, passage] of result.passages.entries()) {
        const preview = passage.text.replace(/\s+/g, ' ').slice(0, 100);
        console.log(chalk.dim(`  ${rank + 1}. [${passage.score.toFixed(3)}] ${preview}`));
      }

      if (result.diagnostics.length > 0) {
        console.log(chalk.bold('Failed candidates:'));
        for (const entry of result.diagnostics) {
          const status = entry.status !== undefined ? ` ${entry.status}` : '';
          console.log(
            chalk.yellow(`  ⚠ ${entry.candidate}`) +
              chalk.dim(` ${entry.outcome}${status} after ${entry.attempts} attempt(s): ${entry.message}`)
          );
        }
      }
    });
}
