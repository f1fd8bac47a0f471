/**
 * Pulls `@tag` words out of a task description.
 * "Call mom @family @phone" -> description "Call mom", tags ["family", "phone"]
 */

const INLINE_TAG_RE = /^@(\S+)$/;

export interface InlineTags {
  description: string;
  tags: string[];
}

export function extractInlineTags(description: string): InlineTags {
  const words: string[] = [];
  const tags: string[] = [];

  for (const word of description.split(/\s+/)) {
    if (!word) continue;
    const m = INLINE_TAG_RE.exec(word);
    if (m?.[1]) {
      if (!tags.includes(m[1])) tags.push(m[1]);
    } else {
      words.push(word);
    }
  }

  return { description: words.join(' '), tags };
}
