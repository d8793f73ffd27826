// ============================================================
// ENSEMBLE MIND — Routing, mode overrides and fallback walk
//
//   1. Route      — router picks (engine, category)
//   2. Mode       — a ready forced engine overrides the route,
//                   category becomes "<category>+<mode>"
//   3. Chain      — [preferred, ...remaining in canonical order]
//   4. Compose    — context block + mode addon + user query
//   5. Walk       — strictly sequential; absent engines are
//                   skipped, failures fall through to the next
//   6. Exhausted  — fixed degraded response, never a throw
//
// Shared state is limited to the session counters and the mode
// registry; each think() call is otherwise independent.
// ============================================================

import type {
  EngineAttempt,
  EngineName,
  MindStats,
  RouteDecision,
  ThinkOptions,
  ThinkResult,
} from '../types'
import type { AdapterSet, EngineAdapter } from './model-adapter'
import { QueryRouter } from './router'
import { ModeRegistry } from './modes'
import { NoEnginesError, describeCause } from './errors'
import { DEGRADED_RESPONSE, ENGINE_PRIORITY, VERSION } from '../config'

export interface EnsembleMindOptions {
  router?: QueryRouter
  modes?: ModeRegistry
  priority?: readonly EngineName[]
}

/**
 * Deterministic try-order for one query: the preferred engine first,
 * then every other known engine in canonical order, each exactly once.
 */
export function buildFallbackChain(
  preferred: EngineName,
  all: readonly EngineName[] = ENGINE_PRIORITY,
): EngineName[] {
  const chain: EngineName[] = [preferred]
  for (const engine of all) {
    if (!chain.includes(engine)) chain.push(engine)
  }
  return chain
}

export function composePrompt(parts: {
  query: string
  context?: string
  modeName?: string
  addon?: string
}): string {
  const context = parts.context?.trim()
  const addon   = parts.addon?.trim()
  if (!context && !addon) return parts.query

  const sections: string[] = []
  if (context) {
    sections.push(`[CONTEXT FROM MEMORY]\n${context}\n[END CONTEXT]`)
  }
  if (addon) {
    const label = parts.modeName ? `[MODE: ${parts.modeName}]` : '[MODE]'
    sections.push(`${label}\n${addon}\n[END MODE]`)
  }
  sections.push(`User query: ${parts.query}`)
  return sections.join('\n\n')
}

export class EnsembleMind {
  readonly router: QueryRouter
  readonly modes:  ModeRegistry

  private adapters:  AdapterSet
  private priority:  readonly EngineName[]
  private byEngine   = new Map<EngineName, number>()
  private byCategory = new Map<string, number>()
  private lastCategory: string | null = null

  constructor(adapters: AdapterSet, options: EnsembleMindOptions = {}) {
    this.adapters = { ...adapters }
    this.router   = options.router   ?? new QueryRouter()
    this.modes    = options.modes    ?? new ModeRegistry()
    this.priority = options.priority ?? ENGINE_PRIORITY
  }

  /** Fails fast when no engine at all is configured. */
  static fromAdapters(adapters: AdapterSet, options: EnsembleMindOptions = {}): EnsembleMind {
    const mind = new EnsembleMind(adapters, options)
    const online = mind.readyEngines().length
    console.info(`[EnsembleMind] ${online}/${mind.priority.length} engines online`)
    if (online === 0) throw new NoEnginesError()
    return mind
  }

  route(query: string): RouteDecision {
    return this.router.route(query)
  }

  isReady(engine: EngineName): boolean {
    return this.adapters[engine] !== undefined
  }

  readyEngines(): EngineName[] {
    return this.priority.filter((e) => this.isReady(e))
  }

  async think(query: string, options: ThinkOptions = {}): Promise<ThinkResult> {
    // Mode is resolved once; a concurrent mode change cannot affect this call
    const mode = this.modes.resolve(options.mode)
    const routed = this.router.route(query)

    let preferred = routed.engine
    let category: string = routed.category
    if (mode.forced_engine && this.isReady(mode.forced_engine)) {
      preferred = mode.forced_engine
      category  = `${routed.category}+${mode.name}`
    }

    const chain  = buildFallbackChain(preferred, this.priority)
    const prompt = composePrompt({
      query,
      context:  options.context,
      modeName: mode.name,
      addon:    mode.prompt_addon,
    })

    const attempts: EngineAttempt[] = []
    for (const engine of chain) {
      const adapter: EngineAdapter | undefined = this.adapters[engine]
      if (!adapter) {
        attempts.push({ engine, status: 'skipped', duration_ms: 0 })
        continue
      }

      const started = Date.now()
      try {
        const response = await adapter.generate(prompt, mode.max_tokens)
        attempts.push({ engine, status: 'succeeded', duration_ms: Date.now() - started })
        this.recordSuccess(engine, category)
        console.info(`[EnsembleMind] [${category.toUpperCase()}] → ${engine}`)
        return { outcome: 'answered', response, engine, category, mode: mode.name, attempts }
      } catch (err) {
        const message = describeCause(err)
        attempts.push({ engine, status: 'failed', error: message, duration_ms: Date.now() - started })
        console.warn(`[EnsembleMind] ${engine} failed: ${message.slice(0, 200)}, trying next...`)
      }
    }

    console.error(`[EnsembleMind] all engines exhausted for [${category}]: ${summarize(attempts)}`)
    return {
      outcome:  'exhausted',
      response: DEGRADED_RESPONSE,
      engine:   null,
      category,
      mode:     mode.name,
      attempts,
    }
  }

  getStats(): MindStats {
    const engines: Record<EngineName, boolean> = {
      claude: this.isReady('claude'),
      gemini: this.isReady('gemini'),
      openai: this.isReady('openai'),
    }

    const queriesByEngine: MindStats['queries_by_engine'] = {}
    for (const [e, n] of this.byEngine) queriesByEngine[e] = n

    return {
      version:             VERSION,
      active_mode:         this.modes.get().name,
      engines_online:      this.readyEngines().length,
      engines,
      queries_by_engine:   queriesByEngine,
      queries_by_category: Object.fromEntries(this.byCategory),
      total_queries:       [...this.byEngine.values()].reduce((sum, n) => sum + n, 0),
      last_category:       this.lastCategory,
    }
  }

  private recordSuccess(engine: EngineName, category: string): void {
    this.byEngine.set(engine, (this.byEngine.get(engine) ?? 0) + 1)
    this.byCategory.set(category, (this.byCategory.get(category) ?? 0) + 1)
    this.lastCategory = category
  }
}

function summarize(attempts: EngineAttempt[]): string {
  return attempts.map((a) => `${a.engine}=${a.status}`).join(', ')
}
