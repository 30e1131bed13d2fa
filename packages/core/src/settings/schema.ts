/**
 * Settings Schema
 *
 * Single source of truth for adapter settings.
 * Defines type, default value and validation bounds for each setting.
 */

// ============================================================================
// Schema Definition Types
// ============================================================================

interface NumberSettingDef {
  type: 'number'
  default: number
  min?: number
  max?: number
}

interface StringSettingDef {
  type: 'string'
  default: string | null
}

interface EnumSettingDef<T extends readonly string[]> {
  type: 'enum'
  values: T
  default: T[number]
}

type SettingDef = NumberSettingDef | StringSettingDef | EnumSettingDef<readonly string[]>

/** Trust store used when neither the transfer nor the adapter names one. */
export const DEFAULT_CA_BUNDLE = '/etc/ssl/certs/ca-certificates.crt'

// ============================================================================
// The Schema
// ============================================================================

export const settingsSchema = {
  /**
   * Period of the force-timeout tick, which drives the engine even when no
   * socket or timer notification arrives (DNS-only phases, connect timeouts).
   */
  forceTimeoutIntervalMs: {
    type: 'number',
    default: 1000,
    min: 10,
    max: 60_000,
  },

  /** CA bundle handed to transfers that have none. null means DEFAULT_CA_BUNDLE. */
  caBundle: {
    type: 'string',
    default: null,
  },

  logLevel: {
    type: 'enum',
    values: ['debug', 'info', 'warn', 'error'] as const,
    default: 'info',
  },
} as const satisfies Record<string, SettingDef>

export type SettingsSchema = typeof settingsSchema

// ============================================================================
// Derived Types
// ============================================================================

export type SettingKey = keyof SettingsSchema

type InferSettingType<S extends SettingDef> = S extends { type: 'number' }
  ? number
  : S extends { type: 'string' }
    ? string | null
    : S extends { type: 'enum'; values: infer V }
      ? V extends readonly (infer U)[]
        ? U
        : never
      : never

export type Settings = {
  [K in SettingKey]: InferSettingType<SettingsSchema[K]>
}

// ============================================================================
// Schema Utilities
// ============================================================================

export function getDefaultValue<K extends SettingKey>(key: K): Settings[K] {
  return validateValue(key, undefined)
}

export function getDefaults(): Settings {
  return {
    forceTimeoutIntervalMs: getDefaultValue('forceTimeoutIntervalMs'),
    caBundle: getDefaultValue('caBundle'),
    logLevel: getDefaultValue('logLevel'),
  }
}

function isNumberKey(key: SettingKey): key is 'forceTimeoutIntervalMs' {
  return settingsSchema[key].type === 'number'
}

function isStringKey(key: SettingKey): key is 'caBundle' {
  return settingsSchema[key].type === 'string'
}

function validateNumber(def: NumberSettingDef, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return def.default
  }
  let v = value
  if (def.min !== undefined) v = Math.max(def.min, v)
  if (def.max !== undefined) v = Math.min(def.max, v)
  return v
}

function validateString(def: StringSettingDef, value: unknown): string | null {
  if (value === null || typeof value === 'string') {
    return value
  }
  return def.default
}

function validateEnum<T extends readonly string[]>(def: EnumSettingDef<T>, value: unknown): T[number] {
  return def.values.find((v) => v === value) ?? def.default
}

/**
 * Validate and coerce a value for a setting.
 * Numbers are clamped into range; wrong types fall back to the default.
 */
export function validateValue<K extends SettingKey>(key: K, value: unknown): Settings[K]
export function validateValue(key: SettingKey, value: unknown): Settings[SettingKey] {
  if (isNumberKey(key)) return validateNumber(settingsSchema[key], value)
  if (isStringKey(key)) return validateString(settingsSchema[key], value)
  return validateEnum(settingsSchema.logLevel, value)
}

/** Fill in a full settings object from a partial one. */
export function resolveSettings(partial: Partial<Settings> = {}): Settings {
  return {
    forceTimeoutIntervalMs: validateValue('forceTimeoutIntervalMs', partial.forceTimeoutIntervalMs),
    caBundle: validateValue('caBundle', partial.caBundle ?? null),
    logLevel: validateValue('logLevel', partial.logLevel),
  }
}

/** The CA bundle path transfers should fall back to. */
export function effectiveCaBundle(settings: Settings): string {
  return settings.caBundle ?? DEFAULT_CA_BUNDLE
}
