// ============================================================
// PROACTIVE SUGGESTIONS — Nudges derived from stored memory
//   stale_task   — unactioned task insight older than N days
//   cross_topic  — one project tag shared by insights of
//                  two or more different types
//   continuity   — last exchange is older than N hours
// Newest first.
// ============================================================

import type { Insight, InsightType, Suggestion } from '../types'
import type { MemoryStore } from './storage'

const DAY_MS  = 24 * 60 * 60 * 1000
const HOUR_MS = 60 * 60 * 1000

export interface SuggestionSource {
  getSuggestions(limit: number): Promise<Suggestion[]>
}

export interface SuggestionOptions {
  staleAfterDays?: number
  continuityAfterHours?: number
  insightWindow?: number
  now?: () => Date
}

export class ProactiveSuggestionService implements SuggestionSource {
  private staleAfterDays: number
  private continuityAfterHours: number
  private insightWindow: number
  private now: () => Date

  constructor(private store: MemoryStore, options: SuggestionOptions = {}) {
    this.staleAfterDays       = options.staleAfterDays       ?? 3
    this.continuityAfterHours = options.continuityAfterHours ?? 12
    this.insightWindow        = options.insightWindow        ?? 50
    this.now                  = options.now                  ?? (() => new Date())
  }

  async getSuggestions(limit: number): Promise<Suggestion[]> {
    const [insights, recent] = await Promise.all([
      this.store.getInsights({ actioned: false, limit: this.insightWindow }),
      this.store.getRecentConversations(1),
    ])
    const now = this.now().getTime()

    const suggestions: Suggestion[] = [
      ...this.staleTasks(insights, now),
      ...this.crossTopics(insights),
    ]

    const last = recent[0]
    if (last && now - Date.parse(last.timestamp) >= this.continuityAfterHours * HOUR_MS) {
      suggestions.push({
        type: 'continuity',
        text: `Last time we talked about: ${last.query.slice(0, 80)}`,
        created_at: last.timestamp,
      })
    }

    return suggestions
      .sort((a, b) => Date.parse(b.created_at) - Date.parse(a.created_at))
      .slice(0, limit)
  }

  private staleTasks(insights: Insight[], now: number): Suggestion[] {
    return insights
      .filter((i) => i.insight_type === 'task')
      .map((i) => ({ insight: i, ageDays: Math.floor((now - Date.parse(i.created_at)) / DAY_MS) }))
      .filter(({ ageDays }) => ageDays >= this.staleAfterDays)
      .map(({ insight, ageDays }) => ({
        type: 'stale_task' as const,
        text: `Open task from ${ageDays} days ago: ${insight.content}`,
        created_at: insight.created_at,
      }))
  }

  private crossTopics(insights: Insight[]): Suggestion[] {
    const byTag = new Map<string, { types: InsightType[]; newest: string }>()
    for (const insight of insights) {
      for (const tag of insight.project_tags) {
        const entry = byTag.get(tag) ?? { types: [], newest: insight.created_at }
        if (!entry.types.includes(insight.insight_type)) entry.types.push(insight.insight_type)
        if (Date.parse(insight.created_at) > Date.parse(entry.newest)) entry.newest = insight.created_at
        byTag.set(tag, entry)
      }
    }

    const out: Suggestion[] = []
    for (const [tag, { types, newest }] of byTag) {
      if (types.length < 2) continue
      out.push({
        type: 'cross_topic',
        text: `${tag} links ${types.join(', ')} insights; worth reviewing together`,
        created_at: newest,
      })
    }
    return out
  }
}
