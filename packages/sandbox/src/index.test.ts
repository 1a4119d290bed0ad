import { describe, it, expect } from 'vitest';
import * as sandbox from './index.js';

describe('sandbox index exports', () => {
  it('re-exports the client, factory and error classes', () => {
    expect(sandbox.SandboxClient).toBeTypeOf('function');
    expect(sandbox.createSandboxClient).toBeTypeOf('function');
    expect(sandbox.ValidationError).toBeTypeOf('function');
    expect(sandbox.RATE_LIMIT_KEYS).toEqual({
      analyze: 'analyze',
      status: 'status',
      list: 'list',
      default: 'default',
    });
  });
});
