import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { ConsoleOperator, UnattendedOperator } from '../../../src/runtime/loop/operator-channel.js';

describe('operator channel', () => {
  describe('ConsoleOperator', () => {
    it('prints the question and returns the typed line', async () => {
      const input = new PassThrough();
      const output = new PassThrough();
      const chunks: string[] = [];
      output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));
      const operator = new ConsoleOperator(input, output);

      const pending = operator.ask('Which database?');
      input.write('postgres\n');

      await expect(pending).resolves.toBe('postgres');
      expect(chunks.join('')).toContain('[AGENT ASKS]: Which database?\n');
      expect(chunks.join('')).toContain('Your answer: ');
    });

    it('rejects when input ends before an answer', async () => {
      const input = new PassThrough();
      const operator = new ConsoleOperator(input, new PassThrough());

      const pending = operator.ask('Anyone there?');
      input.end();

      await expect(pending).rejects.toThrow('operator input closed before an answer was given');
    });
  });

  describe('UnattendedOperator', () => {
    it('fails every question with its reason', async () => {
      await expect(new UnattendedOperator().ask()).rejects.toThrow(
        'no operator is attached to this run'
      );
      await expect(new UnattendedOperator('batch mode').ask()).rejects.toThrow('batch mode');
    });
  });
});
