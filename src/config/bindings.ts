import { z } from 'zod'
import { parseCommand, type Command, type CommandValue } from './commands.js'

const CommandValueSchema: z.ZodType<CommandValue> = z.lazy(() =>
  z.union([z.string(), z.array(CommandValueSchema)])
)

// Unknown fields are kept so they survive a save
const PhasePairSchema = z
  .object({
    pressed: CommandValueSchema.optional(),
    released: CommandValueSchema.optional(),
  })
  .passthrough()

const BindingValueSchema = z.union([z.string(), z.array(CommandValueSchema), PhasePairSchema])

const ProfileSchema = z.record(z.string(), BindingValueSchema)

export const ConfigFileSchema = z
  .record(z.string(), ProfileSchema)
  .refine((profiles) => Object.keys(profiles).length > 0, { message: 'No profile found' })

export type PhasePairValue = z.infer<typeof PhasePairSchema>
export type BindingValue = z.infer<typeof BindingValueSchema>
export type ConfigDocument = z.infer<typeof ConfigFileSchema>

/**
 * What a key does, decided when the configuration is read. `single` and
 * `sequence` bindings only fire when the key is released.
 */
export type Binding =
  | { kind: 'single'; value: string; command: Command }
  | { kind: 'sequence'; value: CommandValue[]; command: Command }
  | { kind: 'phase-pair'; value: PhasePairValue; pressed?: Command; released?: Command }

export type Profile = Map<string, Binding>

/** Profiles in file order */
export type Config = Map<string, Profile>

export function parseBinding(value: BindingValue): Binding {
  if (typeof value === 'string') {
    return { kind: 'single', value, command: parseCommand(value) }
  }
  if (Array.isArray(value)) {
    return { kind: 'sequence', value, command: parseCommand(value) }
  }
  return {
    kind: 'phase-pair',
    value,
    pressed: value.pressed === undefined ? undefined : parseCommand(value.pressed),
    released: value.released === undefined ? undefined : parseCommand(value.released),
  }
}

export function configFromDocument(document: ConfigDocument): Config {
  const config: Config = new Map()
  for (const [profileName, bindings] of Object.entries(document)) {
    const profile: Profile = new Map()
    for (const [key, value] of Object.entries(bindings)) {
      profile.set(key, parseBinding(value))
    }
    config.set(profileName, profile)
  }
  return config
}

export function configToDocument(config: Config): ConfigDocument {
  const document: ConfigDocument = {}
  for (const [profileName, profile] of config) {
    const bindings: Record<string, BindingValue> = {}
    for (const [key, binding] of profile) {
      bindings[key] = binding.value
    }
    document[profileName] = bindings
  }
  return document
}

/**
 * Commands that can run for a key transition; `undefined` when the binding
 * does nothing in this phase
 */
export function commandForPhase(binding: Binding, pressed: boolean): Command | undefined {
  switch (binding.kind) {
    case 'single':
    case 'sequence':
      return pressed ? undefined : binding.command
    case 'phase-pair':
      return pressed ? binding.pressed : binding.released
  }
}
