// ============================================================
// ERRORS — Typed failures crossing service boundaries
// ============================================================

import type { EngineName } from '../types'

// Adapter failure of any kind: transport, provider status, timeout, bad body.
export class EngineError extends Error {
  constructor(
    readonly engine: EngineName,
    cause: unknown,
  ) {
    super(`${engine} failed: ${describeCause(cause)}`, { cause })
    this.name = 'EngineError'
  }
}

export class InvalidModeError extends Error {
  constructor(
    readonly value: string,
    readonly validModes: readonly string[],
  ) {
    super(`Unknown mode "${value}". Valid modes: ${validModes.join(', ')}`)
    this.name = 'InvalidModeError'
  }
}

export class NoEnginesError extends Error {
  constructor() {
    super('No engines available — set at least one of ANTHROPIC_API_KEY, GEMINI_API_KEY, OPENAI_API_KEY')
    this.name = 'NoEnginesError'
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`)
    this.name = 'ConfigError'
  }
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`)
    this.name = 'TimeoutError'
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  if (typeof cause === 'string') return cause
  return String(cause)
}
