import type { Author, Commit, ConventionalCommitResult, RawCommit } from '@/types';
import { CO_AUTHOR_TRAILER } from '@/utils/constants';
import { CommitParser } from 'conventional-commits-parser';

/**
 * Never matches. Body lines such as the `---------` separator GitHub writes into squash merge
 * messages would otherwise open a `-field-` section and hide every trailer after them.
 */
const NO_FIELD_PATTERN = /(?!)/;

/**
 * Parser used for commit bodies only. The subject line is handled by the tokenizer below; the
 * library scans the remaining lines for `Co-authored-by:` trailers, which it reports as notes.
 */
const trailerParser = new CommitParser({
  noteKeywords: [CO_AUTHOR_TRAILER],
  issuePrefixes: ['#'],
  fieldPattern: NO_FIELD_PATTERN,
});

const CO_AUTHOR_VALUE_REGEX = /^(.+?)\s*<([^<>\s]+)>$/;
const EMOJI_CHARACTER_REGEX = /[\p{Extended_Pictographic}\p{Emoji_Modifier}\u200d\ufe0f]/u;
const SHORTCODE_CHARACTER_REGEX = /[a-z0-9_+-]/;

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Subject tokenizer
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

type SubjectTokenKind = 'emoji' | 'space' | 'word' | 'lparen' | 'rparen' | 'bang' | 'colon' | 'text';

interface SubjectToken {
  kind: SubjectTokenKind;
  /** Offset of the first character in the subject */
  start: number;
  /** Offset after the last character */
  end: number;
}

const SINGLE_CHARACTER_TOKENS: Record<string, SubjectTokenKind> = {
  '(': 'lparen',
  ')': 'rparen',
  '!': 'bang',
  ':': 'colon',
};

function classifyCharacter(char: string): SubjectTokenKind {
  if (char === ' ' || char === '\t') {
    return 'space';
  }
  if (char >= 'a' && char <= 'z') {
    return 'word';
  }
  if (char in SINGLE_CHARACTER_TOKENS) {
    return SINGLE_CHARACTER_TOKENS[char];
  }
  if (EMOJI_CHARACTER_REGEX.test(char)) {
    return 'emoji';
  }

  return 'text';
}

/**
 * Length of a `:shortcode:` starting at `start`, or 0 when there is none.
 */
function shortcodeLength(subject: string, start: number): number {
  if (subject[start] !== ':') {
    return 0;
  }

  let index = start + 1;
  while (index < subject.length && SHORTCODE_CHARACTER_REGEX.test(subject[index])) {
    index++;
  }

  return index > start + 1 && subject[index] === ':' ? index + 1 - start : 0;
}

/**
 * Splits a subject line into tokens. Runs of spaces, lowercase letters, pictographs and other
 * text each form one token; parentheses, `!` and `:` are single-character tokens. A `:shortcode:`
 * is recognized as an emoji token only at the start of the line (after optional spaces).
 *
 * Offsets are UTF-16 indexes into `subject`, so tokens can be mapped back with `slice()`.
 */
export function tokenizeSubject(subject: string): SubjectToken[] {
  const tokens: SubjectToken[] = [];
  let index = 0;

  while (index < subject.length) {
    const atLineStart = tokens.every((token) => token.kind === 'space');
    const shortcode = atLineStart ? shortcodeLength(subject, index) : 0;
    if (shortcode > 0) {
      tokens.push({ kind: 'emoji', start: index, end: index + shortcode });
      index += shortcode;
      continue;
    }

    const codePoint = subject.codePointAt(index) ?? 0;
    const char = String.fromCodePoint(codePoint);
    const kind = classifyCharacter(char);
    const previous = tokens[tokens.length - 1];
    const isRun = kind === 'space' || kind === 'word' || kind === 'emoji' || kind === 'text';

    if (isRun && previous?.kind === kind && previous.end === index) {
      previous.end += char.length;
    } else {
      tokens.push({ kind, start: index, end: index + char.length });
    }
    index += char.length;
  }

  return tokens;
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Subject matcher
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Parses a commit subject line according to the conventional commit grammar:
 *
 * `[emoji] <type>[(<scope>)][!]: <description>`
 *
 * - `emoji` is an optional `:shortcode:` or pictograph, followed by optional spaces
 * - `type` is one or more lowercase ASCII letters; unknown types are accepted
 * - `scope` is any non-empty text inside balanced parentheses
 * - `!` marks a breaking change
 * - `: ` separates the header from a non-empty description; further colons belong to the description
 *
 * Only the first line of `subject` is considered.
 *
 * @param subject - The commit subject (first line of the message)
 * @returns The parsed result, or `null` if the subject doesn't match the grammar
 *
 * @example
 * ```typescript
 * parseCommitSubject('feat(api): add user endpoint')
 * // → { emoji: '', type: 'feat', scope: 'api', breaking: false, description: 'add user endpoint' }
 *
 * parseCommitSubject(':bug: fix!: drop legacy flag')
 * // → { emoji: ':bug:', type: 'fix', scope: '', breaking: true, description: 'drop legacy flag' }
 *
 * parseCommitSubject('oops I forgot the prefix')
 * // → null
 * ```
 */
export function parseCommitSubject(subject: string): ConventionalCommitResult | null {
  const line = subject.split('\n')[0].trimEnd();
  const tokens = tokenizeSubject(line);
  let position = 0;

  const peek = (): SubjectToken | undefined => tokens[position];
  const accept = (kind: SubjectTokenKind): SubjectToken | null => {
    const token = tokens[position];
    if (token?.kind !== kind) {
      return null;
    }
    position++;
    return token;
  };
  const text = (token: SubjectToken): string => line.slice(token.start, token.end);

  accept('space');

  let emoji = '';
  const emojiToken = accept('emoji');
  if (emojiToken) {
    emoji = text(emojiToken);
    accept('space');
  }

  const typeToken = accept('word');
  if (!typeToken) {
    return null;
  }

  let scope = '';
  const openParen = accept('lparen');
  if (openParen) {
    let depth = 1;
    while (depth > 0) {
      const token = peek();
      if (!token) {
        return null;
      }
      position++;
      if (token.kind === 'lparen') {
        depth++;
      } else if (token.kind === 'rparen') {
        depth--;
        if (depth === 0) {
          scope = line.slice(openParen.end, token.start);
        }
      }
    }
    if (scope.trim() === '') {
      return null;
    }
  }

  const breaking = accept('bang') !== null;

  if (!accept('colon')) {
    return null;
  }
  const separator = accept('space');
  if (!separator) {
    return null;
  }

  const description = line.slice(separator.end).trim();
  if (description === '') {
    return null;
  }

  return { emoji, type: text(typeToken), scope, breaking, description };
}

/**
 * Serializes parsed subject fields back into `type(scope)!: description` form. The emoji is not
 * part of the output.
 */
export function formatCommitSubject(commit: Pick<ConventionalCommitResult, 'type' | 'scope' | 'breaking' | 'description'>): string {
  const scope = commit.scope ? `(${commit.scope})` : '';
  const bang = commit.breaking ? '!' : '';
  return `${commit.type}${scope}${bang}: ${commit.description}`;
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Trailers and classification
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Extracts `Co-authored-by: Name <mail>` trailers from a commit message, in the order they appear.
 * Trailers without a well-formed `Name <mail>` value are ignored.
 *
 * @param message - The full commit message (subject, blank line, body)
 * @returns Co-authors with empty handles
 */
export function parseCoAuthors(message: string): Author[] {
  if (!message.trim()) {
    return [];
  }

  const { notes } = trailerParser.parse(message);
  const coAuthors: Author[] = [];

  for (const note of notes) {
    if (note.title.toLowerCase() !== CO_AUTHOR_TRAILER.toLowerCase()) {
      continue;
    }

    const match = CO_AUTHOR_VALUE_REGEX.exec(note.text.split('\n')[0].trim());
    if (match) {
      coAuthors.push({ name: match[1], mail: match[2], handle: '' });
    }
  }

  return coAuthors;
}

/**
 * Classifies a raw commit.
 *
 * The commit's author comes first in `authors`, followed by its co-authors. Handles are left empty;
 * they are filled in during aggregation.
 *
 * @returns A frozen commit record, or `null` when the subject is not a conventional commit.
 */
export function classifyCommit(raw: RawCommit): Commit | null {
  const parsed = parseCommitSubject(raw.subject);
  if (!parsed) {
    return null;
  }

  const message = raw.body ? `${raw.subject}\n\n${raw.body}` : raw.subject;
  const authors: Author[] = [
    { name: raw.authorName, mail: raw.authorMail, handle: '' },
    ...parseCoAuthors(message),
  ];

  return Object.freeze({
    hash: raw.id,
    emoji: parsed.emoji,
    type: parsed.type,
    scope: parsed.scope,
    description: parsed.description,
    isBreaking: parsed.breaking,
    authors: Object.freeze(authors),
  });
}
