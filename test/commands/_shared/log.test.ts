import type { Command } from '@oclif/core';
import chalk from 'chalk';
import { beforeAll, describe, expect, it, vi } from 'vitest';
import { logVerbose, logWarning } from '../../../src/commands/_shared/log.js';

describe('log helpers', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('logs verbose messages only when verbose is on', () => {
    const mockCommand = { log: vi.fn() } as unknown as Command;

    logVerbose(mockCommand, 'hidden', false);
    logVerbose(mockCommand, 'shown', true);

    expect(mockCommand.log).toHaveBeenCalledOnce();
    expect(mockCommand.log).toHaveBeenCalledWith('shown');
  });

  it('stays quiet in JSON mode', () => {
    const mockCommand = { log: vi.fn() } as unknown as Command;

    logVerbose(mockCommand, 'hidden', true, true);

    expect(mockCommand.log).not.toHaveBeenCalled();
  });

  it('logs warnings as JSON in JSON mode', () => {
    const mockCommand = { log: vi.fn() } as unknown as Command;

    logWarning(mockCommand, 'careful', true);
    logWarning(mockCommand, 'careful');

    expect(mockCommand.log).toHaveBeenNthCalledWith(1, '{"warning":"careful"}');
    expect(mockCommand.log).toHaveBeenNthCalledWith(2, 'careful');
  });
});
