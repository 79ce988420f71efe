import { pluginSettings } from './constants'
import type { SettingsEntry } from './types'

export type SettingKey = keyof typeof pluginSettings

/**
 * [{ "Setting 1": "value" }, { "Setting 2": "value" }] => { "Setting 1": "value", "Setting 2": "value" }
 */
export function flattenSettings(entries: SettingsEntry[]): Record<string, string> {
  return entries.reduce<Record<string, string>>(
    (acc, entry) => ({ ...acc, ...entry }),
    {}
  )
}

// 插件设置的本地镜像，只读，不回写 TouchPortal
export class PluginSettings {
  private values = new Map<string, string>()

  update(entries: SettingsEntry[]): void {
    const settings = flattenSettings(entries)

    for (const [key, setting] of Object.entries(pluginSettings)) {
      const value = settings[setting.name]
      if (value !== undefined) {
        this.values.set(key, value)
      }
    }
  }

  get(key: SettingKey): string | undefined {
    return this.values.get(key)
  }
}
