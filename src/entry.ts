import { writeFileSync } from 'fs'
import {
  pluginActions,
  pluginCategories,
  pluginInfo,
  pluginSettings,
} from './constants'
import type { ActionDataField, PluginAction } from './types'

interface EntryAction {
  id: string
  name: string
  prefix: string
  type: string
  tryInline: boolean
  format: string
  data: ActionDataField[]
}

interface EntryCategory {
  id: string
  name: string
  imagepath?: string
  actions: EntryAction[]
  states: never[]
  events: never[]
}

export interface EntryDocument {
  sdk: number
  version: number
  name: string
  id: string
  plugin_start_cmd: string
  configuration: {
    colorDark: string
    colorLight: string
  }
  settings: Array<{
    name: string
    type: string
    default: string
    readOnly: boolean
  }>
  categories: EntryCategory[]
}

/**
 * TouchPortal 只接受整数版本号: 1.2.3 => 102
 */
export function toEntryVersion(version: string): number {
  const [major = '0', minor = '0'] = version.split('.')
  return (parseInt(major, 10) || 0) * 100 + (parseInt(minor, 10) || 0)
}

/**
 * 将 format 中的 $[1] / $[message] 替换为 {$<dataId>$}
 */
export function formatActionText(format: string, fields: ActionDataField[]): string {
  return format.replace(/\$\[(\w+)\]/g, (token: string, key: string) => {
    const field = /^\d+$/.test(key)
      ? fields[parseInt(key, 10) - 1]
      : fields.find((item) => item.id.split('.').pop() === key)
    return field ? `{$${field.id}$}` : token
  })
}

function toEntryAction(action: PluginAction): EntryAction {
  const data = Object.values(action.data)

  return {
    id: action.id,
    name: action.name,
    prefix: action.prefix,
    type: action.type,
    tryInline: action.tryInline,
    format: formatActionText(action.format, data),
    data,
  }
}

export function buildEntry(): EntryDocument {
  const actions: PluginAction[] = Object.values(pluginActions)

  return {
    sdk: pluginInfo.sdk,
    version: toEntryVersion(pluginInfo.version),
    name: pluginInfo.name,
    id: pluginInfo.id,
    plugin_start_cmd: pluginInfo.plugin_start_cmd,
    configuration: { ...pluginInfo.configuration },
    settings: Object.values(pluginSettings).map((setting) => ({ ...setting })),
    categories: Object.entries(pluginCategories).map(([key, category]) => ({
      ...category,
      actions: actions
        .filter((action) => action.category === key)
        .map(toEntryAction),
      states: [],
      events: [],
    })),
  }
}

export function writeEntry(file: string): void {
  writeFileSync(file, `${JSON.stringify(buildEntry(), null, 2)}\n`)
}
