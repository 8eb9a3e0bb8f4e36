import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import CommentsAdd from '../../src/commands/comments/add.js';
import CommentsDelete from '../../src/commands/comments/delete.js';
import Comments from '../../src/commands/comments/index.js';
import CommentsMine from '../../src/commands/comments/mine.js';
import CommentsUpdate from '../../src/commands/comments/update.js';
import { type CommandSandbox, FIXED_NOW, createSandbox } from './command-harness.js';

describe('comments commands', () => {
  let sandbox: CommandSandbox;

  beforeEach(() => {
    sandbox = createSandbox();
    sandbox.blog.register('Ana', 'a@x.com');
    sandbox.blog.register('Bruno', 'b@x.com');
    sandbox.blog.createPost('a@x.com', { title: 'Hello', body: 'World' });
    sandbox.blog.createPost('a@x.com', { title: 'Second', body: 'More' });
  });

  afterEach(() => {
    sandbox.cleanup();
  });

  describe('comments add', () => {
    it('comments as the session author', async () => {
      await CommentsAdd.run(['1', 'Nice post', '--as', 'b@x.com', '--data-dir', sandbox.dataDir]);

      expect(sandbox.lines).toEqual(['Added comment #1 to post #1 as Bruno']);
      expect(sandbox.blog.listComments(1)[0].authorId).toBe(2);
    });

    it('comments under a display name', async () => {
      await CommentsAdd.run(['1', 'Thanks', '--name', 'A reader', '--data-dir', sandbox.dataDir]);

      expect(sandbox.lines).toEqual(['Added comment #1 to post #1 as A reader']);
      expect(sandbox.blog.listComments(1)[0].authorId).toBeNull();
    });

    it('does not accept --name together with --as', async () => {
      await expect(
        CommentsAdd.run(['1', 'Hi', '--name', 'A reader', '--as', 'b@x.com', '--data-dir', sandbox.dataDir])
      ).rejects.toThrow(/cannot also be provided when using/);
      expect(sandbox.blog.listComments(1)).toEqual([]);
    });

    it('needs either an author or a display name', async () => {
      await expect(CommentsAdd.run(['1', 'Hi', '--data-dir', sandbox.dataDir])).rejects.toThrow(
        'This command needs an author: pass --as <email> or set POSTBOOK_AUTHOR.'
      );
    });

    it('fails for an unknown post', async () => {
      await expect(
        CommentsAdd.run(['9', 'Hi', '--name', 'A reader', '--data-dir', sandbox.dataDir])
      ).rejects.toThrow('No post found for "9".');
    });
  });

  describe('with comments', () => {
    beforeEach(() => {
      sandbox.blog.addComment(1, 'Nice post', { email: 'b@x.com' });
      sandbox.blog.addComment(1, 'Thanks', { name: 'A reader' });
      sandbox.blog.addComment(2, 'Also good', { email: 'b@x.com' });
    });

    it('lists the comments on a post as JSON', async () => {
      await Comments.run(['1', '--data-dir', sandbox.dataDir, '--json']);

      expect(sandbox.lastJson()).toEqual({
        postId: 1,
        comments: [
          { id: 1, authorName: 'Bruno', body: 'Nice post', createdAt: FIXED_NOW, authorId: 2 },
          { id: 2, authorName: 'A reader', body: 'Thanks', createdAt: FIXED_NOW, authorId: null },
        ],
        count: 2,
      });
    });

    it('lists the session author\'s comments across posts', async () => {
      await CommentsMine.run(['--as', 'b@x.com', '--data-dir', sandbox.dataDir]);

      expect(sandbox.lines).toEqual([
        'Your comments (2)',
        `  #1 Bruno ${FIXED_NOW}: Nice post (post #1)`,
        `  #1 Bruno ${FIXED_NOW}: Also good (post #2)`,
      ]);
    });

    it('lists the session author\'s comments as JSON', async () => {
      await CommentsMine.run(['--as', 'b@x.com', '--data-dir', sandbox.dataDir, '--json']);

      expect(sandbox.lastJson()).toEqual({
        comments: [
          { postId: 1, comment: { id: 1, authorName: 'Bruno', body: 'Nice post', createdAt: FIXED_NOW, authorId: 2 } },
          { postId: 2, comment: { id: 1, authorName: 'Bruno', body: 'Also good', createdAt: FIXED_NOW, authorId: 2 } },
        ],
        count: 2,
      });
    });

    it('says so when the author has no comments', async () => {
      await CommentsMine.run(['--as', 'a@x.com', '--data-dir', sandbox.dataDir]);

      expect(sandbox.lines).toEqual(['You have not commented on any post yet.']);
    });

    it('refuses to edit another author\'s comment', async () => {
      await expect(
        CommentsUpdate.run(['1', '1', 'Edited', '--as', 'a@x.com', '--data-dir', sandbox.dataDir])
      ).rejects.toThrow('You cannot edit comments written by other authors.');
    });

    it('edits the author\'s own comment', async () => {
      await CommentsUpdate.run(['1', '1', 'Very nice post', '--as', 'b@x.com', '--data-dir', sandbox.dataDir]);

      expect(sandbox.lines).toEqual(['Updated comment #1 on post #1']);
      expect(sandbox.blog.listComments(1)[0].body).toBe('Very nice post');
    });

    it('deletes a comment', async () => {
      await CommentsDelete.run(['1', '2', '--data-dir', sandbox.dataDir]);

      expect(sandbox.lines).toEqual(['Deleted comment #2 from post #1']);
      expect(sandbox.blog.listComments(1).map((c) => c.id)).toEqual([1]);
    });

    it('reports a missing comment on delete', async () => {
      await expect(CommentsDelete.run(['1', '7', '--data-dir', sandbox.dataDir])).rejects.toThrow(
        'Comment #7 not found on post #1.'
      );
    });
  });
});
