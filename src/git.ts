import { execFileSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { ExecSyncError, RawCommit, RepositoryGateway, TagRef } from '@/types';
import { ERROR_KIND } from '@/utils/constants';
import { ChangelogError, getErrorMessage } from '@/utils/errors';
import { debug, endGroup, info, startGroup, warning } from '@actions/core';
import which from 'which';

// Files in the git directory that mark an unfinished merge, rebase, cherry-pick or revert
const IN_PROGRESS_MARKERS = ['MERGE_HEAD', 'CHERRY_PICK_HEAD', 'REVERT_HEAD', 'rebase-merge', 'rebase-apply'];

const FIELD_SEPARATOR = '\0';

// Large histories produce a lot of rev-list output
const MAX_OUTPUT_BUFFER = 256 * 1024 * 1024;

function isExecSyncError(error: unknown): error is ExecSyncError {
  return error instanceof Error && 'status' in error;
}

function splitLines(output: string): string[] {
  return output.split('\n').filter((line) => line !== '');
}

/**
 * Read-only access to a local git repository through the `git` executable.
 */
export class GitRepository implements RepositoryGateway {
  /**
   * Absolute path of the working tree.
   */
  public readonly directory: string;

  private readonly gitPath: string;

  private constructor(directory: string, gitPath: string) {
    this.directory = directory;
    this.gitPath = gitPath;
  }

  /**
   * Opens the repository at `directory` and verifies it can be used to generate a changelog.
   *
   * @throws {ChangelogError}
   *   - `NotARepository` when the directory is not inside a git working tree
   *   - `EmptyRepository` when there is no commit yet
   *   - `RepositoryNotClean` when a merge, rebase, cherry-pick or revert is in progress, or tracked
   *     files have uncommitted changes
   *   - `HasUntrackedChanges` when new files are present in the working tree or the index
   */
  public static open(directory: string): GitRepository {
    startGroup('Opening repository');

    try {
      const repository = new GitRepository(directory, which.sync('git'));
      repository.verify();
      info(`Repository: ${directory}`);

      if (repository.isShallow()) {
        warning('Repository is a shallow clone. Fetch the full history (fetch-depth: 0) for a complete changelog.');
      }

      return repository;
    } finally {
      endGroup();
    }
  }

  public resolveRef(name: string): string {
    try {
      return this.git(['rev-parse', '--verify', '--quiet', '--end-of-options', `${name}^{commit}`]).trim();
    } catch (error) {
      throw new ChangelogError(ERROR_KIND.UNRESOLVABLE_REF, `Unable to resolve '${name}' to a commit`, {
        cause: error,
      });
    }
  }

  public listTags(): TagRef[] {
    const format = ['%(refname:strip=2)', '%(objecttype)', '%(objectname)', '%(*objecttype)', '%(*objectname)'].join(
      '%00',
    );
    const output = this.git(['for-each-ref', '--sort=-creatordate', `--format=${format}`, 'refs/tags']);
    const tags: TagRef[] = [];

    for (const line of splitLines(output)) {
      const [name, objectType, objectName, peeledType, peeledName] = line.split(FIELD_SEPARATOR);
      if (objectType === 'commit') {
        tags.push({ name, commitId: objectName });
      } else if (peeledType === 'commit') {
        tags.push({ name, commitId: peeledName });
      } else {
        debug(`Skipping tag ${name}: does not point at a commit`);
      }
    }

    return tags;
  }

  public walkRange(fromId: string | null, toId: string): string[] {
    const range = fromId === null ? toId : `${fromId}..${toId}`;
    return splitLines(this.git(['rev-list', range]));
  }

  public getCommit(id: string): RawCommit {
    const output = this.git(['log', '-1', '--format=%H%x00%an%x00%ae%x00%cn%x00%ce%x00%B', id]);
    const [hash, authorName, authorMail, committerName, committerMail, ...message] = output.split(FIELD_SEPARATOR);
    const [subject, ...body] = message.join(FIELD_SEPARATOR).trim().split('\n');

    return {
      id: hash,
      subject,
      body: body.join('\n').trim(),
      authorName,
      authorMail,
      committerName,
      committerMail,
    };
  }

  public findRootCommit(id: string): string {
    const roots = splitLines(this.git(['rev-list', '--max-parents=0', id]));
    // rev-list lists newest first; with several roots the oldest one bounds the whole history
    return roots[roots.length - 1];
  }

  /**
   * Returns the fetch URL of a remote, or `null` when the remote is not configured.
   */
  public getRemoteUrl(remote: string): string | null {
    try {
      return this.git(['remote', 'get-url', remote]).trim();
    } catch (error) {
      debug(`Remote '${remote}' is not available: ${getErrorMessage(error)}`);
      return null;
    }
  }

  /**
   * Whether the repository was cloned with a limited history depth.
   */
  public isShallow(): boolean {
    return this.git(['rev-parse', '--is-shallow-repository']).trim() === 'true';
  }

  private verify(): void {
    let insideWorkTree: string;
    try {
      insideWorkTree = this.git(['rev-parse', '--is-inside-work-tree']).trim();
    } catch (error) {
      throw new ChangelogError(ERROR_KIND.NOT_A_REPOSITORY, `Not a git repository: ${this.directory}`, {
        cause: error,
      });
    }
    if (insideWorkTree !== 'true') {
      throw new ChangelogError(ERROR_KIND.NOT_A_REPOSITORY, `Not a git working tree: ${this.directory}`);
    }

    try {
      this.git(['rev-parse', '--verify', '--quiet', 'HEAD']);
    } catch (error) {
      if (isExecSyncError(error) && error.status === 1) {
        throw new ChangelogError(ERROR_KIND.EMPTY_REPOSITORY, 'The repository is empty.', { cause: error });
      }
      throw error;
    }

    const gitDirectory = this.git(['rev-parse', '--absolute-git-dir']).trim();
    const marker = IN_PROGRESS_MARKERS.find((name) => existsSync(join(gitDirectory, name)));
    if (marker !== undefined) {
      throw new ChangelogError(ERROR_KIND.REPOSITORY_NOT_CLEAN, `The repository is not clean (${marker} present).`);
    }

    const changes = splitLines(this.git(['status', '--porcelain']));
    if (changes.some((line) => line.startsWith('??') || line.startsWith('A'))) {
      throw new ChangelogError(ERROR_KIND.HAS_UNTRACKED_CHANGES, 'The repository has untracked files.');
    }
    if (changes.length > 0) {
      debug(changes.join('\n'));
      throw new ChangelogError(ERROR_KIND.REPOSITORY_NOT_CLEAN, 'The repository has uncommitted changes.');
    }
  }

  private git(args: string[]): string {
    try {
      return execFileSync(this.gitPath, args, {
        cwd: this.directory,
        encoding: 'utf8',
        maxBuffer: MAX_OUTPUT_BUFFER,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      if (isExecSyncError(error)) {
        const stderr = error.stderr ? error.stderr.toString().trim() : '';
        debug(`git ${args.join(' ')} failed (status: ${error.status})${stderr ? `: ${stderr}` : ''}`);
      }
      throw error;
    }
  }
}
