// ============================================================
// EMBEDDING SERVICE
// OpenAI text-embedding-3-small (1536-dim)
//
// No API key → isAvailable() is false and callers skip the
// semantic path entirely. Failures return null, never throw.
// ============================================================

import { z } from 'zod'
import { describeCause } from './errors'

export const OPENAI_EMBEDDING_MODEL      = 'text-embedding-3-small'
export const MAX_EMBEDDING_INPUT_CHARS   = 8000

const embeddingResponse = z.object({
  data: z.array(z.object({ index: z.number(), embedding: z.array(z.number()) })),
})

export interface Embedder {
  isAvailable(): boolean
  embed(text: string): Promise<number[] | null>
}

export class EmbeddingService implements Embedder {
  private baseUrl: string

  constructor(
    private apiKey: string | null,
    baseUrl?: string | null,          // defaults to https://api.openai.com/v1
    private timeoutMs = 20_000,
  ) {
    this.baseUrl = baseUrl?.replace(/\/$/, '') ?? 'https://api.openai.com/v1'
  }

  isAvailable(): boolean {
    return !!this.apiKey
  }

  async embed(text: string): Promise<number[] | null> {
    if (!this.apiKey) return null
    try {
      const response = await fetch(`${this.baseUrl}/embeddings`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: OPENAI_EMBEDDING_MODEL,
          input: text.slice(0, MAX_EMBEDDING_INPUT_CHARS),
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      })

      if (!response.ok) {
        const errText = await response.text().catch(() => '')
        console.warn(`[EmbeddingService] OpenAI error ${response.status}:`, errText.slice(0, 200))
        return null
      }

      const data = embeddingResponse.parse(await response.json())
      const first = [...data.data].sort((a, b) => a.index - b.index)[0]
      return first && first.embedding.length > 0 ? first.embedding : null
    } catch (err) {
      console.warn('[EmbeddingService] embed error:', describeCause(err).slice(0, 120))
      return null
    }
  }
}
