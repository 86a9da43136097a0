import crypto from 'crypto';

const MAX_SLUG_LENGTH = 100;

/**
 * Lowercase, hyphen-separated identifier for a topic. Letters and digits of
 * any script are kept; accents on Latin letters are folded to the base letter.
 * Text with no letters or digits at all (emoji, punctuation) falls back to
 * `untitled-<hash>` so distinct topics never share a slug.
 */
export function slugify(text: string): string {
  const slug = Array.from(
    text
      .toLowerCase()
      .normalize('NFKD')
      .replace(/[\u0300-\u036f]/g, '')
      .normalize('NFC')
      .replace(/[^\p{L}\p{N}\p{M}]+/gu, '-')
      .replace(/^-+|-+$/g, '')
  )
    .slice(0, MAX_SLUG_LENGTH)
    .join('')
    .replace(/-+$/g, '');

  if (slug) return slug;

  const digest = crypto.createHash('sha1').update(text).digest('hex').slice(0, 8);
  return `untitled-${digest}`;
}

export function buildOutputPath(topic: string, category: string): string {
  return `output/${slugify(topic)}-${category}.html`;
}
