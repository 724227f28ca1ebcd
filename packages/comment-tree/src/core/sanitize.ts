const TAG_PATTERN = /<[^>]+>/g
const ENTITY_PATTERN = /&(quot|amp|lt|gt);/g
const ENTITIES: Record<string, string> = { quot: '"', amp: '&', lt: '<', gt: '>' }
// handles made of word characters and `_ - + .`
const MENTION_PATTERN = /@[\p{L}\p{M}\p{N}_+.-]+\s*/gu
// anything else starting with `@`; broader than the above and may eat legitimate text
const LOOSE_MENTION_PATTERN = /@\S+\s*/gu
const INVISIBLE_PATTERN = /[\u200B-\u200D\uFEFF]/g
const WHITESPACE_PATTERN = /\s+/g

function sanitizeOnce(raw: string) {
  let text = raw.replace(TAG_PATTERN, '')
  // single pass: `&amp;lt;` becomes `&lt;`, not `<`
  text = text.replace(ENTITY_PATTERN, (_, name: string) => ENTITIES[name] ?? '')
  text = text.replace(MENTION_PATTERN, '').replace(LOOSE_MENTION_PATTERN, '')
  text = text.replace(INVISIBLE_PATTERN, '')
  return text.replace(WHITESPACE_PATTERN, ' ').trim()
}

/**
 * Normalize user-generated comment text to plain text.
 *
 * Strips tags, decodes `&quot; &amp; &lt; &gt;`, removes @mentions and zero-width characters,
 * then collapses whitespace. Decoding can surface new markup (`&lt;b&gt;` turns into `<b>`),
 * so passes repeat until the text stops changing; every pass that changes already-clean
 * text shortens it, which bounds the loop.
 *
 * Known lossy cases: unbalanced angle brackets (`a < b > c` loses ` b `) and any `@word`
 * that is not a mention.
 */
export function sanitizeCommentText(raw: string): string {
  let current = sanitizeOnce(raw)
  for (;;) {
    const next = sanitizeOnce(current)
    if (next === current) return current
    current = next
  }
}
