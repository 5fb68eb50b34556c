const GLOB_SPECIALS = new Set(["*", "?", "[", "]", "\\"])
const REGEXP_SPECIALS = /[.*+?^${}()|[\]\\/-]/g

function escapeRegExp(text: string): string {
  return text.replace(REGEXP_SPECIALS, "\\$&")
}

/**
 * Escapes glob syntax so `text` only ever matches itself inside a pattern.
 */
export function escapeGlob(text: string): string {
  let out = ""
  for (const ch of text) {
    out += GLOB_SPECIALS.has(ch) ? `\\${ch}` : ch
  }
  return out
}

function translateClass(pattern: string, start: number): { source: string; end: number } {
  let i = start + 1
  const negated = pattern.charAt(i) === "^"
  if (negated) i++

  const toSource = (body: string): string => `[${negated ? "^" : ""}${body}]`

  let body = ""
  for (; i < pattern.length; i++) {
    const ch = pattern.charAt(i)

    if (ch === "\\" && i + 1 < pattern.length) {
      i++
      body += escapeRegExp(pattern.charAt(i))
      continue
    }
    if (ch === "]") return { source: toSource(body), end: i }

    if (i + 2 < pattern.length && pattern.charAt(i + 1) === "-") {
      const end = pattern.charAt(i + 2)
      const lo = ch <= end ? ch : end
      const hi = ch <= end ? end : ch
      body += `${escapeRegExp(lo)}-${escapeRegExp(hi)}`
      i += 2
      continue
    }

    body += escapeRegExp(ch)
  }

  // Unclosed: the rest of the pattern is the class.
  return { source: toSource(body), end: pattern.length - 1 }
}

/**
 * Compiles a Redis `KEYS`/`SCAN MATCH` glob into an anchored RegExp.
 *
 * Supports `*`, `?`, `[abc]`, `[^abc]`, `[a-z]` and `\` escapes, with the
 * same edge cases as Redis: reversed ranges are swapped and an unclosed `[`
 * takes the rest of the pattern as its class.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = ""

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i)

    if (ch === "*") {
      source += ".*"
    } else if (ch === "?") {
      source += "."
    } else if (ch === "\\" && i + 1 < pattern.length) {
      i++
      source += escapeRegExp(pattern.charAt(i))
    } else if (ch === "[") {
      const cls = translateClass(pattern, i)
      source += cls.source
      i = cls.end
    } else {
      source += escapeRegExp(ch)
    }
  }

  return new RegExp(`^${source}$`, "s")
}

export function matchesGlob(pattern: string, text: string): boolean {
  return globToRegExp(pattern).test(text)
}
