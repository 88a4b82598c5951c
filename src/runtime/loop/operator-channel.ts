/**
 * Operator Channel
 *
 * Blocking question/answer exchange with the human running the loop.
 */

import { createInterface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';

/**
 * Something that can answer the agent's questions.
 */
export interface OperatorChannel {
  ask(question: string): Promise<string>;
}

/**
 * Terminal operator: prints the question, reads one line.
 */
export class ConsoleOperator implements OperatorChannel {
  constructor(
    private readonly input: Readable = process.stdin,
    private readonly output: Writable = process.stdout
  ) {}

  async ask(question: string): Promise<string> {
    const rl = createInterface({ input: this.input, output: this.output, terminal: false });
    try {
      this.output.write(`\n[AGENT ASKS]: ${question}\n`);
      return await new Promise<string>((resolve, reject) => {
        const onClose = (): void => {
          reject(new Error('operator input closed before an answer was given'));
        };
        rl.once('close', onClose);
        void rl.question('Your answer: ').then((answer) => {
          rl.off('close', onClose);
          resolve(answer);
        }, reject);
      });
    } finally {
      rl.close();
    }
  }
}

/**
 * Operator for unattended runs: every question fails with the given reason.
 */
export class UnattendedOperator implements OperatorChannel {
  constructor(private readonly reason = 'no operator is attached to this run') {}

  ask(): Promise<string> {
    return Promise.reject(new Error(this.reason));
  }
}
