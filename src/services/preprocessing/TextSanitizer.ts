const MENTION_PATTERN = /@[\p{L}\p{N}\p{M}_]+/gu;
const URL_PATTERN =
  /([\p{L}\p{N}_]+?:\/\/)?(?:www\.)?[-a-zA-Z0-9@:%._\\+~#=]{1,256}\.[a-zA-Z]{1,10}(?![\p{L}\p{N}\p{M}_])(?:[-a-zA-Z0-9()@:%_\\+.~#?&\\/=]*)/gu;
const WHITESPACE_PATTERN = /\s+/gu;

/**
 * Strips mentions and URLs from a tweet and collapses whitespace.
 * Mentions go first, then URLs, then whitespace. Word characters include
 * non-Latin letters, so `@Çağla` is a mention and `site.comçok` is not a URL.
 */
export function sanitize(text: string): string {
  return text
    .replace(MENTION_PATTERN, ' ')
    .replace(URL_PATTERN, '')
    .replace(WHITESPACE_PATTERN, ' ');
}
