import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import Tags from '../../src/commands/tags.js';
import { type CommandSandbox, createSandbox } from './command-harness.js';

describe('tags', () => {
  let sandbox: CommandSandbox;

  beforeEach(() => {
    sandbox = createSandbox();
  });

  afterEach(() => {
    sandbox.cleanup();
  });

  it('says so when no tags are in use', async () => {
    await Tags.run(['--data-dir', sandbox.dataDir]);

    expect(sandbox.lines).toEqual(['No tags in use yet.']);
  });

  describe('with tagged posts', () => {
    beforeEach(() => {
      sandbox.blog.register('Ana', 'a@x.com');
      sandbox.blog.createPost('a@x.com', { title: 'One', body: 'x', tags: ['node', 'cli'] });
      sandbox.blog.createPost('a@x.com', { title: 'Two', body: 'x', tags: ['node'] });
    });

    it('prints a table, most used first', async () => {
      await Tags.run(['--data-dir', sandbox.dataDir]);

      expect(sandbox.lines).toEqual(['Tag   Posts', '─'.repeat(11), 'node      2', 'cli       1']);
    });

    it('prints JSON with --json', async () => {
      await Tags.run(['--data-dir', sandbox.dataDir, '--json']);

      expect(sandbox.lastJson()).toEqual({
        tags: [
          { tag: 'node', count: 2 },
          { tag: 'cli', count: 1 },
        ],
        count: 2,
      });
    });
  });
});
