import { parseBinding, type Binding, type Config, type Profile } from '../config/bindings.js'

/**
 * Everything the event loop mutates: the loaded profiles, which one is
 * active and the last key-state snapshot. A reload builds a new instance
 * instead of patching this one.
 */
export class ClientState {
  /** Last key-state snapshot received from the daemon */
  keys = 0

  private constructor(
    readonly config: Config,
    private profileName: string
  ) {}

  /**
   * Keep `preferredProfile` active when it still exists, otherwise fall back
   * to the first profile
   */
  static fromConfig(config: Config, preferredProfile?: string, keys = 0): ClientState {
    const first = config.keys().next()
    if (first.done) {
      throw new Error('Configuration has no profile')
    }
    const profile = preferredProfile !== undefined && config.has(preferredProfile) ? preferredProfile : first.value
    const state = new ClientState(config, profile)
    state.keys = keys
    return state
  }

  get activeProfile(): string {
    return this.profileName
  }

  get profile(): Profile {
    const profile = this.config.get(this.profileName)
    if (!profile) {
      throw new Error(`Active profile "${this.profileName}" is missing`)
    }
    return profile
  }

  hasProfile(name: string): boolean {
    return this.config.has(name)
  }

  bindingFor(key: string): Binding | undefined {
    return this.profile.get(key)
  }

  /**
   * Returns false and leaves the state alone when the profile is unknown
   */
  switchProfile(name: string): boolean {
    if (!this.config.has(name)) return false
    this.profileName = name
    return true
  }

  /**
   * Bind `command` to `key` in the active profile, replacing what was there
   */
  bind(key: string, command: string): Binding {
    const binding = parseBinding(command)
    this.profile.set(key, binding)
    return binding
  }
}
