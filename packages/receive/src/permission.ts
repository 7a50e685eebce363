/**
 * Permission Gate
 *
 * Obtains the operator's consent before anything is written or any bulk
 * connection is attempted.
 */

import * as readline from 'node:readline';
import type { Logger } from 'pino';
import { CONSENT_PROMPT } from './constants.js';
import { ResponderError } from './errors.js';
import type { OutputStream, Prompter } from './types.js';

export interface PermissionGateOptions {
  /** Grant without asking */
  autoAccept: boolean;
  prompt: Prompter;
  stderr: OutputStream;
  logger: Logger;
}

export class PermissionGate {
  private readonly options: PermissionGateOptions;
  private readonly logger: Logger;

  constructor(options: PermissionGateOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: 'permission-gate' });
  }

  /**
   * Resolve once consent is granted.
   *
   * Re-prompts until the answer starts with `y` or `n`. A refusal raises
   * the responder error "transfer rejected".
   */
  async ask(): Promise<void> {
    if (this.options.autoAccept) {
      this.logger.debug({ answer: 'auto' }, 'Consent granted');
      return;
    }

    const startedAt = Date.now();
    for (;;) {
      const answer = (await this.options.prompt(CONSENT_PROMPT)).toLowerCase();
      if (answer.startsWith('y')) {
        this.logger.debug({ answer: 'yes', waitedMs: Date.now() - startedAt }, 'Consent granted');
        return;
      }
      if (answer.startsWith('n')) {
        this.logger.debug({ answer: 'no', waitedMs: Date.now() - startedAt }, 'Consent refused');
        this.options.stderr.write('transfer rejected\n');
        throw new ResponderError('transfer rejected');
      }
    }
  }
}

/** Prompter over a line stream; `close()` releases the input */
export type ReadlinePrompter = Prompter & { close(): void };

/**
 * Build a prompter that reads one line per question from a single
 * readline interface, opened on the first question.
 * Resolves with the trimmed answer; rejects once the input has ended.
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ReadlinePrompter {
  let rl: readline.Interface | null = null;
  let lines: AsyncIterableIterator<string> | null = null;

  const prompt = async (question: string): Promise<string> => {
    if (lines === null) {
      rl = readline.createInterface({ input, terminal: false });
      lines = rl[Symbol.asyncIterator]();
    }
    output.write(question);
    const next = await lines.next();
    if (next.done) {
      throw new Error('input closed before an answer was given');
    }
    return next.value.trim();
  };

  return Object.assign(prompt, {
    close(): void {
      rl?.close();
    },
  });
}
