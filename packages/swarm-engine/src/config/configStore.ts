/**
 * Config Store
 *
 * Keyed parameter table owned by the host application. The simulation reads
 * typed snapshots; the UI and the modulator write through setValue, where
 * late binding by string key is genuinely needed.
 *
 * Snapshots are immutable: every write produces a new SwarmParams object, so
 * a snapshot taken at the start of a phase stays consistent for that phase.
 */

import { createAtom } from '@liks/system'
import {
  isParameterKey,
  parameterTableSchema,
  swarmParamsSchema,
} from '../vocabulary'
import type {
  ParameterDefinition,
  ParameterKey,
  ParameterValue,
  SwarmParams,
} from '../vocabulary'
import { normalizeValue } from './normalize'
import parameterTable from './parameters.json'

// ============================================================================
// Types
// ============================================================================

export type ConfigStore = {
  /** Typed read of a single parameter */
  get: <K extends ParameterKey>(key: K) => SwarmParams[K]

  /** Typed write; the value is still normalised into the parameter's domain */
  set: <K extends ParameterKey>(key: K, value: SwarmParams[K]) => void

  /** Late-bound read for UI/modulator code. Throws on unknown keys. */
  getValue: (key: string) => ParameterValue

  /** Late-bound write for UI/modulator code. Throws on unknown keys. */
  setValue: (key: string, value: unknown) => void

  /** Apply several writes with a single notification */
  update: (values: Partial<Record<ParameterKey, unknown>>) => void

  /** Immutable typed view of every parameter */
  snapshot: () => Readonly<SwarmParams>

  getDefinition: (key: string) => ParameterDefinition
  definitions: () => ReadonlyArray<ParameterDefinition>

  /** Definitions grouped by section, sections in declaration order */
  definitionsBySection: () => Map<string, Array<ParameterDefinition>>

  subscribe: (listener: (params: Readonly<SwarmParams>) => void) => () => void

  /** Restore every parameter to its default */
  reset: () => void
}

export type ConfigStoreOptions = {
  /** Parameter table; defaults to the bundled parameters.json */
  definitions?: ReadonlyArray<ParameterDefinition>
  /** Initial values applied over the defaults (normalised) */
  initial?: Partial<Record<ParameterKey, unknown>>
}

// ============================================================================
// Parameter Table
// ============================================================================

/**
 * Parse and validate the bundled parameter table
 */
export function loadParameterDefinitions(): Array<ParameterDefinition> {
  return parameterTableSchema.parse(parameterTable).definitions
}

// ============================================================================
// Factory
// ============================================================================

export function createConfigStore(options: ConfigStoreOptions = {}): ConfigStore {
  const definitionList = options.definitions ?? loadParameterDefinitions()
  const index = new Map<string, ParameterDefinition>()

  for (const definition of definitionList) {
    if (!isParameterKey(definition.key)) {
      throw new Error(`[Config] Unknown parameter in table: ${definition.key}`)
    }
    index.set(definition.key, definition)
  }

  const requireDefinition = (key: string): ParameterDefinition => {
    const definition = index.get(key)
    if (!definition) {
      throw new Error(`[Config] Unknown parameter: ${key}`)
    }
    return definition
  }

  const applyWrites = (
    base: Readonly<SwarmParams>,
    values: Partial<Record<string, unknown>>,
  ): SwarmParams => {
    const next: Record<string, unknown> = { ...base }
    for (const [key, value] of Object.entries(values)) {
      next[key] = normalizeValue(requireDefinition(key), value)
    }
    return swarmParamsSchema.parse(next)
  }

  const defaults = swarmParamsSchema.parse(
    Object.fromEntries(definitionList.map((definition) => [definition.key, definition.default])),
  )

  const state = createAtom<Readonly<SwarmParams>>(
    options.initial ? applyWrites(defaults, options.initial) : defaults,
  )

  const setValue = (key: string, value: unknown) => {
    state.set(applyWrites(state.get(), { [key]: value }))
  }

  return {
    get: (key) => state.get()[key],
    set: (key, value) => setValue(key, value),
    getValue: (key) => {
      if (!isParameterKey(key) || !index.has(key)) {
        throw new Error(`[Config] Unknown parameter: ${key}`)
      }
      return state.get()[key]
    },
    setValue,
    update: (values) => {
      state.set(applyWrites(state.get(), values))
    },
    snapshot: () => state.get(),
    getDefinition: requireDefinition,
    definitions: () => definitionList,
    definitionsBySection: () => {
      const sections = new Map<string, Array<ParameterDefinition>>()
      for (const definition of definitionList) {
        const section = sections.get(definition.section) ?? []
        section.push(definition)
        sections.set(definition.section, section)
      }
      return sections
    },
    subscribe: (listener) => state.subscribe(listener),
    reset: () => {
      state.set(defaults)
    },
  }
}
