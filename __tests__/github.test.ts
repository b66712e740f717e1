import { GitHubCommitHistory, GitHubIdentityLookup } from '@/github';
import { countRequests, createOctokitStub } from '@/tests/helpers/octokit';
import type { OctokitStub } from '@/tests/helpers/octokit';
import { debug } from '@actions/core';
import { beforeEach, describe, expect, it } from 'vitest';

const REPO = { owner: 'acme', repo: 'widgets' };

describe('github', () => {
  let stub: OctokitStub;

  beforeEach(() => {
    stub = createOctokitStub();
  });

  describe('GitHubCommitHistory', () => {
    it('should map a page of commits to identity records', async () => {
      stub.commits.push(
        { sha: 'c3', authorMail: 'alice@example.com', authorLogin: 'alice', committerLogin: 'alice' },
        { sha: 'c2', authorMail: 'bob@example.com' },
        { sha: 'c1', authorMail: 'carol@example.com', authorLogin: 'carol', committerMail: 'noreply@github.com', committerLogin: 'web-flow' },
      );
      const history = new GitHubCommitHistory(stub.octokit, REPO);

      await expect(history.listCommitPage('c3', 1)).resolves.toEqual([
        {
          sha: 'c3',
          authorMail: 'alice@example.com',
          authorLogin: 'alice',
          committerMail: 'alice@example.com',
          committerLogin: 'alice',
        },
        { sha: 'c2', authorMail: 'bob@example.com', authorLogin: '', committerMail: 'bob@example.com', committerLogin: '' },
        {
          sha: 'c1',
          authorMail: 'carol@example.com',
          authorLogin: 'carol',
          committerMail: 'noreply@github.com',
          committerLogin: 'web-flow',
        },
      ]);
      expect(history.pageSize).toBe(100);
      expect(debug).toHaveBeenCalledWith('Fetched 3 commits of acme/widgets (page 1)');
    });

    it('should request the history of the head commit one page at a time', async () => {
      for (let index = 150; index > 0; index--) {
        stub.commits.push({ sha: `c${index}`, authorMail: 'alice@example.com' });
      }
      const history = new GitHubCommitHistory(stub.octokit, REPO);

      const first = await history.listCommitPage('c150', 1);
      const second = await history.listCommitPage('c150', 2);

      expect(first).toHaveLength(100);
      expect(second).toHaveLength(50);
      expect(second[0].sha).toBe('c50');
      expect(countRequests(stub, 'repos.listCommits')).toBe(2);

      const url = new URL(String(stub.fetch.mock.calls[1][0]));
      expect(url.pathname).toBe('/repos/acme/widgets/commits');
      expect(url.searchParams.get('sha')).toBe('c150');
      expect(url.searchParams.get('per_page')).toBe('100');
      expect(url.searchParams.get('page')).toBe('2');
    });

    it('should include the status in the error of a failed request', async () => {
      stub.failures.set('repos.listCommits', 500);
      const history = new GitHubCommitHistory(stub.octokit, REPO);

      await expect(history.listCommitPage('c1', 1)).rejects.toThrow(
        'Failed to list commits of acme/widgets: Server Error (status: 500)',
      );
    });

    it('should fail for an unknown head commit', async () => {
      const history = new GitHubCommitHistory(stub.octokit, REPO);

      await expect(history.listCommitPage('missing', 1)).rejects.toThrow(
        'Failed to list commits of acme/widgets: No commit found for SHA: missing (status: 404)',
      );
    });
  });

  describe('GitHubIdentityLookup', () => {
    it('should read the login of a noreply address without a request', async () => {
      const lookup = new GitHubIdentityLookup(stub.octokit);

      await expect(lookup.findHandle('12345+octocat@users.noreply.github.com')).resolves.toBe('octocat');
      expect(stub.fetch).not.toHaveBeenCalled();
    });

    it('should search users by public email', async () => {
      stub.users.set('bob@example.com', 'bobby');
      const lookup = new GitHubIdentityLookup(stub.octokit);

      await expect(lookup.findHandle('bob@example.com')).resolves.toBe('bobby');
      expect(countRequests(stub, 'search.users')).toBe(1);

      const url = new URL(String(stub.fetch.mock.calls[0][0]));
      expect(url.searchParams.get('q')).toBe('bob@example.com in:email');
      expect(url.searchParams.get('per_page')).toBe('1');
    });

    it('should return null when no user matches', async () => {
      const lookup = new GitHubIdentityLookup(stub.octokit);

      await expect(lookup.findHandle('nobody@example.com')).resolves.toBeNull();
    });

    it('should include the status in the error of a failed search', async () => {
      stub.failures.set('search.users', 403);
      const lookup = new GitHubIdentityLookup(stub.octokit);

      await expect(lookup.findHandle('bob@example.com')).rejects.toThrow(
        'Failed to search users by email bob@example.com: API rate limit exceeded (status: 403)',
      );
    });
  });
});
