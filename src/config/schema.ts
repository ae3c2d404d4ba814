import {z} from 'zod'

export const PROVIDER_NAMES = ['base', 'openrouter', 'gemini'] as const

export const providerNameSchema = z.enum(PROVIDER_NAMES)

export type ProviderName = z.infer<typeof providerNameSchema>

export const DEFAULT_MODEL = 'default-model'

export const providerSettingsSchema = z.object({
  api_key: z.string().default(''),
  model: z.string().default(DEFAULT_MODEL)
})

export type ProviderSettings = z.infer<typeof providerSettingsSchema>

/**
 * On-disk settings document. Provider entries are kept as a record so that
 * entries the user added by hand survive a load/save cycle.
 */
export const settingsSchema = z.object({
  default_provider: z.string().default('base'),
  providers: z.record(z.string(), providerSettingsSchema)
})

export type Settings = z.infer<typeof settingsSchema>

export function defaultProviderSettings(): ProviderSettings {
  return {api_key: '', model: DEFAULT_MODEL}
}

export function defaultSettings(): Settings {
  return {
    default_provider: 'base',
    providers: Object.fromEntries(PROVIDER_NAMES.map((name) => [name, defaultProviderSettings()]))
  }
}

export function isProviderName(value: string): value is ProviderName {
  return providerNameSchema.safeParse(value).success
}
