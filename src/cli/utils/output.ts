/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';

/**
 * Output format types
 */
export enum OutputFormat {
  HUMAN = 'human',
  JSON = 'json'
}

/**
 * Symbols for terminal output
 */
const symbols = {
  error: '✗',
  warning: '⚠',
  bullet: '•'
};

/**
 * Output formatter class
 *
 * Human output goes through chalk; JSON output is one pretty-printed
 * document per call on stdout.
 */
export class OutputFormatter {
  constructor(private format: OutputFormat = OutputFormat.HUMAN) {}

  error(message: string, error?: unknown): void {
    if (this.format === OutputFormat.JSON) {
      this.json({
        status: 'error',
        message,
        error: error instanceof Error ? { name: error.name, message: error.message } : undefined
      });
      return;
    }
    console.error(`${chalk.red(symbols.error)} ${chalk.red(message)}`);
    if (error instanceof Error) {
      console.error(`  ${chalk.dim(error.message)}`);
    }
  }

  warning(message: string): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'warning', message });
      return;
    }
    console.warn(`${chalk.yellow(symbols.warning)} ${chalk.yellow(message)}`);
  }

  /**
   * Outputs a list
   */
  list(items: string[], ordered: boolean = false): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ type: 'list', items, ordered });
      return;
    }
    items.forEach((item, i) => {
      const prefix = ordered ? `${i + 1}.` : symbols.bullet;
      console.log(`  ${chalk.dim(prefix)} ${item}`);
    });
  }

  /**
   * Outputs raw JSON
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  setFormat(format: OutputFormat): void {
    this.format = format;
  }

  isJson(): boolean {
    return this.format === OutputFormat.JSON;
  }
}

/**
 * Default output formatter instance
 */
export const output = new OutputFormatter();
