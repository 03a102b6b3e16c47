import { DEFAULT_TUTOR_POLICY } from '../../constants/pipeline-constants.js';
import type { RetrievedPassage } from '../../models/passage.js';
import { Logger, logger as defaultLogger } from '../../cli/utils/logger.js';

export const PASSAGE_SEPARATOR = '\n\n';

export interface ContextAssemblerOptions {
  /** Instructions placed ahead of the context (default: built-in tutor policy) */
  policy?: string;

  /**
   * Upper bound on prompt length in characters; 0 disables the guard.
   * Lowest-ranked passages are dropped first. Policy and question are never cut.
   */
  maxPromptChars?: number;

  logger?: Logger;
}

/**
 * Join passage texts in rank order, blank line between them
 */
export function buildContext(passages: readonly Pick<RetrievedPassage, 'text'>[]): string {
  return passages.map((passage) => passage.text).join(PASSAGE_SEPARATOR);
}

/**
 * Deterministic prompt layout: policy, labeled Context block, labeled Question block
 */
export function formatPrompt(policy: string, context: string, query: string): string {
  return `${policy}\n\nContext:\n${context}\n\nQuestion:\n${query}`;
}

/**
 * Merges retrieved passages, the tutoring policy and the question into a prompt
 */
export class ContextAssembler {
  private readonly policy: string;
  private readonly maxPromptChars: number;
  private readonly logger: Logger;

  constructor(options: ContextAssemblerOptions = {}) {
    this.policy = options.policy ?? DEFAULT_TUTOR_POLICY;
    this.maxPromptChars = options.maxPromptChars ?? 0;
    this.logger = options.logger ?? defaultLogger;
  }

  assemble(passages: readonly RetrievedPassage[], query: string, policy: string = this.policy): string {
    let kept = passages.length;
    let prompt = formatPrompt(policy, buildContext(passages), query);

    if (this.maxPromptChars > 0) {
      while (prompt.length > this.maxPromptChars && kept > 0) {
        kept--;
        prompt = formatPrompt(policy, buildContext(passages.slice(0, kept)), query);
      }

      if (kept < passages.length) {
        this.logger.warn('Prompt exceeded length guard; dropped lowest-ranked passages', {
          dropped: passages.length - kept,
          kept,
          max_prompt_chars: this.maxPromptChars,
          prompt_chars: prompt.length
        });
      }
    }

    return prompt;
  }
}
