/**
 * Element Basename Parser
 *
 * Basenames carry the element's display name and tags:
 *
 *   "Sunset beach #travel #2024.jpg"
 *     -> name "Sunset beach", tags ["travel", "2024"], extension "jpg"
 *
 * A tag is a `#` at the start of the name or after whitespace, followed by
 * characters other than whitespace and `#`.
 */

export interface ParsedBasename {
  name: string;
  tags: string[];
  /** As written in the basename; kind lookup is case-insensitive */
  extension: string;
}

const TAG_PATTERN = /(^|\s)#([^\s#]+)/g;

// Forbidden on at least one common filesystem, plus control characters
const FORBIDDEN_CHARACTERS = /[/\\:*?"<>|\u0000-\u001f\u007f]/g;

export function splitExtension(basename: string): { stem: string; extension: string } {
  const dot = basename.lastIndexOf('.');
  if (dot <= 0) {
    return { stem: basename, extension: '' };
  }
  return { stem: basename.slice(0, dot), extension: basename.slice(dot + 1) };
}

export function parseBasename(basename: string): ParsedBasename {
  const { stem, extension } = splitExtension(basename);

  const tags: string[] = [];
  for (const match of stem.matchAll(TAG_PATTERN)) {
    if (!tags.includes(match[2])) {
      tags.push(match[2]);
    }
  }

  return {
    name: stem.replace(TAG_PATTERN, '').trim(),
    tags,
    extension,
  };
}

export function sanitizeName(name: string): string {
  return name.replace(FORBIDDEN_CHARACTERS, '').trim();
}

export function sanitizeTag(tag: string): string {
  return tag.replace(FORBIDDEN_CHARACTERS, '').replace(/#/g, '').trim().replace(/\s+/g, '-');
}

/**
 * Inverse of parseBasename for canonical input: sanitized name, then each
 * distinct tag as ` #tag`, then the extension.
 */
export function buildBasename({ name, tags, extension }: ParsedBasename): string {
  const cleanTags: string[] = [];
  for (const tag of tags.map(sanitizeTag)) {
    if (tag && !cleanTags.includes(tag)) {
      cleanTags.push(tag);
    }
  }

  const stem = [sanitizeName(name), ...cleanTags.map(tag => `#${tag}`)]
    .filter(part => part.length > 0)
    .join(' ');
  const cleanExtension = extension.replace(FORBIDDEN_CHARACTERS, '').replace(/\./g, '');

  return cleanExtension ? `${stem}.${cleanExtension}` : stem;
}
