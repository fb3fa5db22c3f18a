/**
 * Command Runner Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@pipewright/core';
import { ExecFileRunner } from '../command-runner.js';

describe('ExecFileRunner', () => {
  it('reports a missing executable as a configuration error', async () => {
    const runner = new ExecFileRunner();

    const error = await runner.run('pipewright-no-such-binary', ['--version']).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      message: 'Command not found: pipewright-no-such-binary. Is it installed and on PATH?',
      retryable: false,
    });
  });
});
