// ============================================================
// QUERY ROUTER — Picks the engine best suited to a query.
//
// Ordered, first-match-wins classification:
//   1. creative vocabulary   → premium  (claude)
//   2. complex vocabulary    → premium  (claude)
//   3. data vocabulary       → fast     (gemini)
//   4. ≥10 Arabic characters → premium  (claude)
//   5. ≥200 characters       → premium  (claude)
//   6. short greeting        → fast     (gemini)
//   7. everything else       → fast     (gemini)
//
// Pure: no I/O, no state. Earlier rules mask later ones.
// ============================================================

import type { Category, EngineName, RouteDecision } from '../types'
import vocabulary from '../config/vocabulary.json'

export interface RouterVocabulary {
  creative: readonly string[]
  complex: readonly string[]
  data: readonly string[]
  greetings: readonly string[]
}

export const ARABIC_CHAR_THRESHOLD = 10
export const LONG_QUERY_CHARS      = 200
export const SIMPLE_MAX_CHARS      = 30
export const TINY_QUERY_CHARS      = 10

const PREMIUM: EngineName = 'claude'
const FAST:    EngineName = 'gemini'

export class QueryRouter {
  private vocab: RouterVocabulary

  constructor(vocab?: RouterVocabulary) {
    this.vocab = vocab ?? vocabulary
  }

  route(query: string): RouteDecision {
    const q = query.toLowerCase().trim()

    if (containsAny(q, this.vocab.creative)) return decision(PREMIUM, 'creative')
    if (containsAny(q, this.vocab.complex))  return decision(PREMIUM, 'complex')
    if (containsAny(q, this.vocab.data))     return decision(FAST, 'data')

    // Absolute count, not a ratio: mixed-script queries still qualify
    if (countArabic(query) >= ARABIC_CHAR_THRESHOLD) return decision(PREMIUM, 'arabic')

    if (query.length >= LONG_QUERY_CHARS) return decision(PREMIUM, 'long')

    if (q.length > 0 && q.length < SIMPLE_MAX_CHARS && this.isSimple(q)) return decision(FAST, 'simple')

    return decision(FAST, 'default')
  }

  private isSimple(q: string): boolean {
    if (q.length < TINY_QUERY_CHARS) return true
    return this.vocab.greetings.some(
      (g) => q === g || q.startsWith(`${g} `) || q.startsWith(`${g},`),
    )
  }
}

export function countArabic(text: string): number {
  let count = 0
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0
    if (code >= 0x0600 && code <= 0x06ff) count++
  }
  return count
}

function containsAny(q: string, terms: readonly string[]): boolean {
  return terms.some((term) => q.includes(term))
}

function decision(engine: EngineName, category: Category): RouteDecision {
  return { engine, category }
}
