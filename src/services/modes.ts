// ============================================================
// MODE REGISTRY — Named behaviour bundles + the active mode
//
// A mode only changes how a query is enriched and which engine
// is preferred. It never touches engine readiness.
// ============================================================

import type { ModeConfig, ModeName } from '../types'
import { MODES, MODE_NAMES, isModeName } from '../config'
import { InvalidModeError } from './errors'

export interface ResolvedMode extends ModeConfig {
  name: ModeName
}

export class ModeRegistry {
  private active: ModeName

  constructor(
    initial: ModeName = 'balanced',
    private table: Record<ModeName, ModeConfig> = MODES,
  ) {
    this.active = initial
  }

  // Validates an external string against the enumeration
  static parse(value: string): ModeName {
    const name = value.trim().toLowerCase()
    if (!isModeName(name)) throw new InvalidModeError(value, MODE_NAMES)
    return name
  }

  lookup(name: ModeName): ResolvedMode {
    return { name, ...this.table[name] }
  }

  list(): ResolvedMode[] {
    return MODE_NAMES.map((name) => this.lookup(name))
  }

  get(): ResolvedMode {
    return this.lookup(this.active)
  }

  set(name: ModeName): ResolvedMode {
    this.active = name
    console.info(`[ModeRegistry] active mode → ${name}`)
    return this.lookup(name)
  }

  // Per-request override wins over the process-wide mode
  resolve(override?: ModeName): ResolvedMode {
    return this.lookup(override ?? this.active)
  }
}
