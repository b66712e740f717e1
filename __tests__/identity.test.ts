import { IdentityResolver, collectRemoteIdentities } from '@/identity';
import type { IdentityLookup, RemoteCommitRecord, RemoteHistory } from '@/types';
import { ChangelogError } from '@/utils/errors';
import { debug, endGroup, info, startGroup, warning } from '@actions/core';
import { describe, expect, it, vi } from 'vitest';

function createLookup(handles: Record<string, string> = {}) {
  const findHandle = vi.fn(async (mail: string): Promise<string | null> => handles[mail] ?? null);
  const lookup: IdentityLookup = { findHandle };
  return { lookup, findHandle };
}

function record(sha: string, mail: string, login = '', committerMail = mail, committerLogin = login): RemoteCommitRecord {
  return { sha, authorMail: mail, authorLogin: login, committerMail, committerLogin };
}

function createHistory(pages: RemoteCommitRecord[][], pageSize = 2) {
  const listCommitPage = vi.fn(async (_head: string, page: number) => pages[page - 1] ?? []);
  const history: RemoteHistory = { pageSize, listCommitPage };
  return { history, listCommitPage };
}

describe('identity', () => {
  describe('IdentityResolver', () => {
    it('should cache seeded handles', () => {
      const resolver = new IdentityResolver(null);

      resolver.seed('alice@example.com', 'alice');

      expect(resolver.getCached('alice@example.com')).toBe('alice');
      expect(resolver.size).toBe(1);
    });

    it('should ignore empty seeds', () => {
      const resolver = new IdentityResolver(null);

      resolver.seed('alice@example.com', '');
      resolver.seed('', 'alice');

      expect(resolver.size).toBe(0);
    });

    it('should keep the first non-empty handle', () => {
      const resolver = new IdentityResolver(null);

      resolver.seed('alice@example.com', 'alice');
      resolver.seed('alice@example.com', 'alice-alt');

      expect(resolver.getCached('alice@example.com')).toBe('alice');
    });

    it('should resolve to an empty handle without a lookup', async () => {
      const resolver = new IdentityResolver(null);

      await expect(resolver.resolve('alice@example.com')).resolves.toBe('');
      expect(resolver.getCached('alice@example.com')).toBe('');
    });

    it('should not look up seeded mails', async () => {
      const { lookup, findHandle } = createLookup();
      const resolver = new IdentityResolver(lookup);
      resolver.seed('alice@example.com', 'alice');

      await expect(resolver.resolve('alice@example.com')).resolves.toBe('alice');
      expect(findHandle).not.toHaveBeenCalled();
    });

    it('should look up each mail only once', async () => {
      const { lookup, findHandle } = createLookup({ 'bob@example.com': 'bob' });
      const resolver = new IdentityResolver(lookup);

      await expect(resolver.resolve('bob@example.com')).resolves.toBe('bob');
      await expect(resolver.resolve('bob@example.com')).resolves.toBe('bob');
      expect(findHandle).toHaveBeenCalledTimes(1);
    });

    it('should share a pending lookup between concurrent callers', async () => {
      const { lookup, findHandle } = createLookup({ 'bob@example.com': 'bob' });
      const resolver = new IdentityResolver(lookup);

      const handles = await Promise.all([resolver.resolve('bob@example.com'), resolver.resolve('bob@example.com')]);

      expect(handles).toEqual(['bob', 'bob']);
      expect(findHandle).toHaveBeenCalledTimes(1);
    });

    it('should cache a miss as an empty handle', async () => {
      const { lookup, findHandle } = createLookup();
      const resolver = new IdentityResolver(lookup);

      await expect(resolver.resolve('ghost@example.com')).resolves.toBe('');
      await expect(resolver.resolve('ghost@example.com')).resolves.toBe('');
      expect(findHandle).toHaveBeenCalledTimes(1);
      expect(debug).toHaveBeenCalledWith('No account found for ghost@example.com');
    });

    it('should warn and cache an empty handle when the lookup fails', async () => {
      const findHandle = vi.fn(async (): Promise<string | null> => {
        throw new Error('API rate limit exceeded');
      });
      const resolver = new IdentityResolver({ findHandle });

      await expect(resolver.resolve('bob@example.com')).resolves.toBe('');
      await expect(resolver.resolve('bob@example.com')).resolves.toBe('');
      expect(findHandle).toHaveBeenCalledTimes(1);
      expect(warning).toHaveBeenCalledWith('Failed to look up account for bob@example.com: API rate limit exceeded');
    });

    it('should resolve distinct mails in first-seen order', async () => {
      const { lookup, findHandle } = createLookup({ 'bob@example.com': 'bob', 'carol@example.com': 'carol' });
      const resolver = new IdentityResolver(lookup);

      const handles = await resolver.resolveAll([
        'carol@example.com',
        'bob@example.com',
        'carol@example.com',
        'dave@example.com',
      ]);

      expect([...handles.entries()]).toEqual([
        ['carol@example.com', 'carol'],
        ['bob@example.com', 'bob'],
        ['dave@example.com', ''],
      ]);
      expect(findHandle).toHaveBeenCalledTimes(3);
    });

    it('should bound the number of parallel lookups', async () => {
      let active = 0;
      let peak = 0;
      const findHandle = vi.fn(async (mail: string): Promise<string | null> => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 1));
        active--;
        return mail.split('@')[0];
      });
      const resolver = new IdentityResolver({ findHandle }, 2);

      const handles = await resolver.resolveAll(['a@example.com', 'b@example.com', 'c@example.com', 'd@example.com', 'e@example.com']);

      expect(handles.get('e@example.com')).toBe('e');
      expect(findHandle).toHaveBeenCalledTimes(5);
      expect(peak).toBe(2);
    });
  });

  describe('collectRemoteIdentities', () => {
    it('should read pages until a short page and seed the logins', async () => {
      const { history, listCommitPage } = createHistory([
        [record('c3', 'alice@example.com', 'alice'), record('c2', 'bob@example.com')],
        [record('c1', 'carol@example.com', 'carol', 'noreply@github.com', 'web-flow')],
      ]);
      const resolver = new IdentityResolver(null);

      await expect(collectRemoteIdentities(history, 'c3', 'c0', resolver)).resolves.toBe(3);

      expect(listCommitPage).toHaveBeenCalledTimes(2);
      expect(listCommitPage).toHaveBeenNthCalledWith(1, 'c3', 1);
      expect(listCommitPage).toHaveBeenNthCalledWith(2, 'c3', 2);
      expect(resolver.getCached('alice@example.com')).toBe('alice');
      expect(resolver.getCached('carol@example.com')).toBe('carol');
      expect(resolver.getCached('noreply@github.com')).toBe('web-flow');
      expect(resolver.getCached('bob@example.com')).toBeUndefined();
      expect(startGroup).toHaveBeenCalledWith('Reading remote commit history');
      expect(info).toHaveBeenCalledWith('Read 3 remote commits, 3 known contributors');
      expect(endGroup).toHaveBeenCalledTimes(1);
    });

    it('should stop at the page containing the sentinel commit', async () => {
      const { history, listCommitPage } = createHistory([
        [record('c4', 'alice@example.com', 'alice'), record('c3', 'bob@example.com', 'bob')],
        [record('c2', 'carol@example.com', 'carol'), record('c1', 'dave@example.com', 'dave')],
      ]);
      const resolver = new IdentityResolver(null);

      await expect(collectRemoteIdentities(history, 'c4', 'c3', resolver)).resolves.toBe(2);

      expect(listCommitPage).toHaveBeenCalledTimes(1);
      expect(resolver.getCached('carol@example.com')).toBeUndefined();
    });

    it('should request one more page after a full last page', async () => {
      const { history, listCommitPage } = createHistory([
        [record('c2', 'alice@example.com', 'alice'), record('c1', 'bob@example.com', 'bob')],
      ]);
      const resolver = new IdentityResolver(null);

      await expect(collectRemoteIdentities(history, 'c2', 'c0', resolver)).resolves.toBe(2);

      expect(listCommitPage).toHaveBeenCalledTimes(2);
      expect(info).toHaveBeenCalledWith('Read 2 remote commits, 2 known contributors');
    });

    it('should fail without seeding when a page cannot be fetched', async () => {
      const listCommitPage = vi.fn(async (_head: string, page: number): Promise<RemoteCommitRecord[]> => {
        if (page === 2) {
          throw new Error('Server Error (status: 500)');
        }
        return [record('c4', 'alice@example.com', 'alice'), record('c3', 'bob@example.com', 'bob')];
      });
      const resolver = new IdentityResolver(null);

      let thrown: unknown;
      try {
        await collectRemoteIdentities({ pageSize: 2, listCommitPage }, 'c4', 'c0', resolver);
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ChangelogError);
      expect(thrown instanceof ChangelogError ? thrown.kind : undefined).toBe('RemoteHistoryFetchFailure');
      expect(thrown instanceof Error ? thrown.message : undefined).toBe(
        'Failed to fetch remote history page 2: Server Error (status: 500)',
      );
      expect(resolver.size).toBe(0);
      expect(endGroup).toHaveBeenCalledTimes(1);
    });
  });
});
