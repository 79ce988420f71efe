export interface PluginInfo {
  sdk: number
  version: string
  name: string
  id: string
  plugin_start_cmd: string
  configuration: {
    colorDark: string
    colorLight: string
  }
}

export interface PluginSetting {
  name: string
  type: 'text' | 'number'
  default: string
  readOnly: boolean
}

export interface PluginCategory {
  id: string
  name: string
  imagepath?: string
}

export interface ActionDataField {
  id: string
  type: 'text'
  label: string
  default: string
}

export interface PluginAction {
  category: string
  id: string
  name: string
  prefix: string
  type: 'communicate' | 'execute'
  tryInline: boolean
  format: string
  data: Record<string, ActionDataField>
}

export interface ActionDataItem {
  id: string
  value: string
}

// TouchPortal 下发的设置格式: [{ "Setting name": "value" }, ...]
export type SettingsEntry = Record<string, string>

export interface ConnectPayload {
  pluginId?: string
  sdkVersion?: number
  tpVersionString?: string
  tpVersionCode?: number
  pluginVersion?: number
  status?: string
  settings: SettingsEntry[]
}

export interface SettingUpdatePayload {
  pluginId?: string
  values: SettingsEntry[]
}

export interface ActionPayload {
  pluginId?: string
  actionId: string
  data: ActionDataItem[]
}

export interface ShutdownPayload {
  pluginId?: string
}

export interface HostEventMap {
  connect: ConnectPayload
  settingUpdate: SettingUpdatePayload
  action: ActionPayload
  shutdown: ShutdownPayload
  error: Error
}

export type HostEventType = keyof HostEventMap

export type HostEvent = {
  [K in Exclude<HostEventType, 'error'>]: { type: K; payload: HostEventMap[K] }
}[Exclude<HostEventType, 'error'>]

export type HostEventHandler<K extends HostEventType> = (
  payload: HostEventMap[K]
) => void | Promise<void>

export type HostEventHandlers = {
  [K in HostEventType]?: HostEventHandler<K>
}
