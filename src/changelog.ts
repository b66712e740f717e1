import type { Author, Commit, KnownCommitType, Segment, SegmentNames } from '@/types';
import {
  COMMIT_TYPE,
  CONTRIBUTORS_HEADING,
  ISSUE_REFERENCE_REGEX,
  OTHER_COMMIT_TYPE,
  SECTION_HEADINGS,
} from '@/utils/constants';
import { formatList, shortHash } from '@/utils/string';

/**
 * Rendering options shared by every segment of a run.
 */
export interface ChangelogOptions {
  /** Web URL of the repository (`https://host/owner/repo`), empty when unknown */
  repoUrl: string;
  /** Keep the commit's emoji in front of its description */
  useEmoji: boolean;
}

/**
 * A rendered section: heading and the commits listed under it.
 */
export interface ChangelogSection {
  heading: string;
  commits: Commit[];
}

type SectionKey = KnownCommitType | typeof OTHER_COMMIT_TYPE;

const KNOWN_COMMIT_TYPES: ReadonlySet<string> = new Set(Object.values(COMMIT_TYPE));
const SECTION_ORDER: readonly SectionKey[] = [...Object.values(COMMIT_TYPE), OTHER_COMMIT_TYPE];

function isKnownCommitType(type: string): type is KnownCommitType {
  return KNOWN_COMMIT_TYPES.has(type);
}

function formatAuthor(author: Author): string {
  return author.handle ? `@${author.handle}` : author.name;
}

function formatContributor(author: Author): string {
  return author.handle ? `- ${author.name} (@${author.handle})` : `- ${author.name} <${author.mail}>`;
}

/**
 * Formats a single commit as a Markdown list item.
 *
 * `- **scope** description ([abc1234](<repoUrl>/commit/<hash>)) - by @alice and Bob`
 *
 * The commit reference is left out when the description already mentions an issue or pull request
 * (`#123`). Without a repository URL the short hash is printed as inline code.
 */
export function formatCommitLine(commit: Commit, options: ChangelogOptions): string {
  const parts = ['-'];
  if (commit.scope) {
    parts.push(`**${commit.scope}**`);
  }
  if (options.useEmoji && commit.emoji) {
    parts.push(commit.emoji);
  }
  parts.push(commit.description);

  let line = parts.join(' ');
  if (!ISSUE_REFERENCE_REGEX.test(commit.description)) {
    const hash = shortHash(commit.hash);
    line += options.repoUrl ? ` ([${hash}](${options.repoUrl}/commit/${commit.hash}))` : ` (\`${hash}\`)`;
  }

  return `${line} - by ${formatList(commit.authors.map(formatAuthor))}`;
}

/**
 * Groups the commits of a segment into changelog sections, in rendering order.
 *
 * Breaking commits of every type are listed under Breaking Changes only; the type sections hold the
 * remaining commits. Types without a section of their own are merged into Others. Empty sections
 * are left out.
 */
export function groupSections(segment: Segment): ChangelogSection[] {
  const buckets = new Map<SectionKey, Commit[]>();
  for (const [type, commits] of segment.commitsByType) {
    const key: SectionKey = isKnownCommitType(type) ? type : OTHER_COMMIT_TYPE;
    buckets.set(key, [...(buckets.get(key) ?? []), ...commits]);
  }

  const breaking = SECTION_ORDER.flatMap((key) => buckets.get(key) ?? []).filter((commit) => commit.isBreaking);
  const sections: ChangelogSection[] = [{ heading: SECTION_HEADINGS.breaking, commits: breaking }];

  for (const key of SECTION_ORDER) {
    sections.push({
      heading: SECTION_HEADINGS[key],
      commits: (buckets.get(key) ?? []).filter((commit) => !commit.isBreaking),
    });
  }

  return sections.filter((section) => section.commits.length > 0);
}

/**
 * Renders the changelog entry of one segment.
 *
 * The entry starts with the `toName` heading and, when the repository URL is known, a compare link
 * between both names. Non-empty sections follow, then the contributors. The result ends with a
 * newline.
 */
export function renderSegmentChangelog(segment: Segment, names: SegmentNames, options: ChangelogOptions): string {
  const blocks = [`## ${names.toName}`];

  if (options.repoUrl) {
    blocks.push(`[compare changes](${options.repoUrl}/compare/${names.fromName}...${names.toName})`);
  }

  for (const { heading, commits } of groupSections(segment)) {
    blocks.push([`### ${heading}`, '', ...commits.map((commit) => formatCommitLine(commit, options))].join('\n'));
  }

  if (segment.contributors.size > 0) {
    const contributors = [...segment.contributors.values()].map(formatContributor);
    blocks.push([`### ${CONTRIBUTORS_HEADING}`, '', ...contributors].join('\n'));
  }

  return `${blocks.join('\n\n')}\n`;
}

/**
 * Renders every segment, newest first, separated by a blank line.
 */
export function renderChangelog(
  entries: ReadonlyArray<{ segment: Segment; names: SegmentNames }>,
  options: ChangelogOptions,
): string {
  return entries.map(({ segment, names }) => renderSegmentChangelog(segment, names, options)).join('\n');
}
