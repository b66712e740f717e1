import { resolve } from 'node:path';
import { renderChangelog } from '@/changelog';
import { getConfig } from '@/config';
import { getContext } from '@/context';
import { GitRepository } from '@/git';
import { GitHubCommitHistory, GitHubIdentityLookup } from '@/github';
import { IdentityResolver, collectRemoteIdentities } from '@/identity';
import { resolveBoundaries } from '@/range';
import { aggregateSegments } from '@/segment';
import { getSegmentNames } from '@/semver';
import { buildTagIndex } from '@/tags';
import type { Config, Context, RemoteLocation, Segment, SegmentNames } from '@/types';
import { getErrorMessage } from '@/utils/errors';
import { prependToFile } from '@/utils/file';
import { isGitHubHost, parseRemoteUrl } from '@/utils/github';
import { debug, endGroup, info, setFailed, setOutput, startGroup } from '@actions/core';

interface ChangelogEntry {
  segment: Segment;
  names: SegmentNames;
}

/**
 * Initializes and returns the configuration and context objects.
 * Config must be initialized before context due to dependency constraints.
 *
 * @returns {{ config: Config; context: Context }} Initialized config and context objects.
 */
function initialize(): { config: Config; context: Context } {
  const configInstance = getConfig();
  const contextInstance = getContext();

  return { config: configInstance, context: contextInstance };
}

/**
 * Locates the hosted copy of the repository through the configured remote.
 *
 * @returns The parsed remote, or `null` when the remote is missing or its URL is not recognized.
 */
function getRemoteLocation(repository: GitRepository, remote: string): RemoteLocation | null {
  const remoteUrl = repository.getRemoteUrl(remote);
  if (remoteUrl === null) {
    info(`Remote '${remote}' not found. Links and contributor handles are disabled.`);
    return null;
  }

  const location = parseRemoteUrl(remoteUrl);
  if (location === null) {
    info(`Unrecognized URL for remote '${remote}': ${remoteUrl}. Links and contributor handles are disabled.`);
  }

  return location;
}

/**
 * Sets the GitHub Action outputs from the rendered entries. The newest segment determines `version`
 * and `release-type`.
 */
function setActionOutputs(changelog: string, entries: ChangelogEntry[]): void {
  const segments = entries.map(({ segment, names }) => ({
    from: segment.fromBoundary,
    to: segment.toBoundary,
    fromName: names.fromName,
    toName: names.toName,
    releaseType: names.proposal?.releaseType ?? '',
    hasBreaking: segment.hasBreaking,
  }));
  const [newest] = segments;

  startGroup('GitHub Action Outputs');
  info(`Version: ${newest.toName}`);
  info(`Release type: ${newest.releaseType || '(already tagged)'}`);
  info(`Segments: ${JSON.stringify(segments, null, 2)}`);
  endGroup();

  setOutput('changelog', changelog);
  setOutput('version', newest.toName);
  setOutput('release-type', newest.releaseType);
  setOutput('segments', segments);
}

/**
 * Entry point for the GitHub Action. Generates the changelog of the configured commit range,
 * optionally prepends it to the changelog file and exposes it through the action outputs.
 *
 * Any failure marks the action as failed; no output is set in that case.
 *
 * @returns {Promise<void>} Resolves when the action completes successfully or after setting failure.
 */
export async function run(): Promise<void> {
  try {
    const { config, context } = initialize();

    const repository = GitRepository.open(context.repositoryDir);
    const tagIndex = buildTagIndex(repository, config.tagPrefix);
    const boundaries = resolveBoundaries({ from: config.from, to: config.to }, repository, tagIndex);

    const location = getRemoteLocation(repository, config.remote);
    const gitHubLocation =
      location !== null && config.githubToken !== '' && isGitHubHost(location.host, context.serverHost)
        ? location
        : null;

    const resolver = new IdentityResolver(gitHubLocation ? new GitHubIdentityLookup(context.octokit) : null);
    if (gitHubLocation) {
      await collectRemoteIdentities(
        new GitHubCommitHistory(context.octokit, gitHubLocation),
        boundaries[0],
        boundaries[boundaries.length - 1],
        resolver,
      );
    } else {
      info('Not a GitHub repository or no token available. Contributor handles are not resolved.');
    }

    const segments = await aggregateSegments(boundaries, repository, resolver);
    const entries: ChangelogEntry[] = segments.map((segment) => ({
      segment,
      names: getSegmentNames(segment, tagIndex, config.tagPrefix, config.releaseType),
    }));

    const changelog = renderChangelog(entries, { repoUrl: location?.webUrl ?? '', useEmoji: config.useEmoji });
    debug(changelog);

    if (config.changelogFile) {
      const changelogPath = resolve(context.repositoryDir, config.changelogFile);
      prependToFile(changelogPath, changelog);
      info(`Changelog written to ${changelogPath}`);
    }

    setActionOutputs(changelog, entries);
  } catch (error) {
    setFailed(getErrorMessage(error));
  }
}
