import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InstructionStore, loadInstruction } from '../../../src/runtime/loop/instruction-store.js';
import { createMockLogger } from '../../helpers/factories.js';

describe('instruction store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'instruction-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the current file content', async () => {
    const path = join(dir, 'task.md');
    await writeFile(path, 'Build it');

    expect(await new InstructionStore(path, 'initial').current()).toBe('Build it');
  });

  it('falls back to the start-up text and warns when unreadable', async () => {
    const logger = createMockLogger();

    const text = await loadInstruction(join(dir, 'missing.md'), 'initial', logger);

    expect(text).toBe('initial');
    expect(logger.calls.warn).toHaveLength(1);
  });

  it('sees its own updates on the next read', async () => {
    const path = join(dir, 'task.md');
    await writeFile(path, 'v1');
    const store = new InstructionStore(path, 'v1');

    await store.update('v2');
    await store.update('v3');

    expect(await store.current()).toBe('v3');
  });
});
