import { describe, it, expect } from 'vitest';
import { toOpenAITool } from '../../../src/llm/tool-schema.js';

describe('toOpenAITool', () => {
  it('builds a closed object schema with required parameters', () => {
    const tool = toOpenAITool('read_file', 'Read a file', [
      { name: 'path', type: 'string', description: 'File path', required: true },
      { name: 'encoding', type: 'string', description: 'Encoding', required: false },
    ]);

    expect(tool).toEqual({
      type: 'function',
      function: {
        name: 'read_file',
        description: 'Read a file',
        parameters: {
          type: 'object',
          properties: {
            path: { type: 'string', description: 'File path' },
            encoding: { type: 'string', description: 'Encoding' },
          },
          additionalProperties: false,
          required: ['path'],
        },
      },
    });
  });

  it('omits required when nothing is required', () => {
    const tool = toOpenAITool('done', 'Finish', []);
    expect('required' in tool.function.parameters).toBe(false);
  });

  it('rejects names providers do not accept', () => {
    expect(() => toOpenAITool('core.tools', 'x', [])).toThrow('Invalid tool name: core.tools');
    expect(() => toOpenAITool('a'.repeat(65), 'x', [])).toThrow();
  });
});
