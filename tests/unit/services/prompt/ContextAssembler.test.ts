import { describe, it, expect } from 'vitest';
import {
  ContextAssembler,
  buildContext,
  formatPrompt
} from '../../../../src/services/prompt/ContextAssembler.js';
import { DEFAULT_TUTOR_POLICY } from '../../../../src/constants/pipeline-constants.js';
import type { RetrievedPassage } from '../../../../src/models/passage.js';
import { RecordingLogger } from '../../../helpers/fakes.js';

function passage(id: number, text: string): RetrievedPassage {
  return { id, text, score: 1 - id / 10, metadata: {} };
}

describe('buildContext', () => {
  it('joins passages with a blank line in rank order', () => {
    expect(buildContext([passage(1, 'first'), passage(2, 'second')])).toBe('first\n\nsecond');
  });

  it('is empty without passages', () => {
    expect(buildContext([])).toBe('');
  });
});

describe('formatPrompt', () => {
  it('lays out policy, context and question', () => {
    expect(formatPrompt('POLICY', 'CTX', 'Q?')).toBe('POLICY\n\nContext:\nCTX\n\nQuestion:\nQ?');
  });
});

describe('ContextAssembler', () => {
  it('uses the built-in policy by default', () => {
    const prompt = new ContextAssembler({ logger: new RecordingLogger() }).assemble([], 'hello');

    expect(prompt).toBe(`${DEFAULT_TUTOR_POLICY}\n\nContext:\n\n\nQuestion:\nhello`);
  });

  it('is deterministic for the same input', () => {
    const assembler = new ContextAssembler({ policy: 'P', logger: new RecordingLogger() });
    const passages = [passage(1, 'alpha'), passage(2, 'beta')];

    expect(assembler.assemble(passages, 'q')).toBe(assembler.assemble(passages, 'q'));
    expect(assembler.assemble(passages, 'q')).toBe('P\n\nContext:\nalpha\n\nbeta\n\nQuestion:\nq');
  });

  it('accepts a per-call policy', () => {
    const assembler = new ContextAssembler({ policy: 'P', logger: new RecordingLogger() });

    expect(assembler.assemble([], 'q', 'OTHER')).toBe('OTHER\n\nContext:\n\n\nQuestion:\nq');
  });

  it('drops lowest-ranked passages to respect the length guard', () => {
    const logger = new RecordingLogger();
    const assembler = new ContextAssembler({ policy: 'P', maxPromptChars: 30, logger });

    const prompt = assembler.assemble([passage(1, 'aaaa'), passage(2, 'bbbb')], 'Q');

    expect(prompt).toBe('P\n\nContext:\naaaa\n\nQuestion:\nQ');
    expect(logger.entries).toContainEqual({
      level: 'warn',
      message: 'Prompt exceeded length guard; dropped lowest-ranked passages',
      context: { dropped: 1, kept: 1, max_prompt_chars: 30, prompt_chars: 29 }
    });
  });

  it('never cuts the policy or the question', () => {
    const assembler = new ContextAssembler({ policy: 'P', maxPromptChars: 10, logger: new RecordingLogger() });

    expect(assembler.assemble([passage(1, 'aaaa')], 'Q')).toBe('P\n\nContext:\n\n\nQuestion:\nQ');
  });

  it('keeps every passage when the guard is off', () => {
    const logger = new RecordingLogger();
    const assembler = new ContextAssembler({ policy: 'P', maxPromptChars: 0, logger });
    const long = 'x'.repeat(10_000);

    expect(assembler.assemble([passage(1, long)], 'Q')).toContain(long);
    expect(logger.messages('warn')).toEqual([]);
  });
});
