import type {
  ActionDataItem,
  HostEvent,
  SettingsEntry,
} from './types'

export type HostMessageType = 'info' | 'settings' | 'action' | 'closePlugin'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined
}

function toSettingsEntries(value: unknown): SettingsEntry[] {
  if (!Array.isArray(value)) {
    return []
  }

  return value.filter(isRecord).map((entry) => {
    const settings: SettingsEntry = {}
    for (const [name, setting] of Object.entries(entry)) {
      settings[name] = setting == null ? '' : String(setting)
    }
    return settings
  })
}

function toActionData(value: unknown): ActionDataItem[] {
  if (!Array.isArray(value)) {
    return []
  }

  return value
    .filter(isRecord)
    .filter((item) => typeof item.id === 'string')
    .map((item) => ({
      id: String(item.id),
      value: item.value == null ? '' : String(item.value),
    }))
}

/**
 * 把 TouchPortalClient 事件数据还原为带 type 的协议消息，Settings 可能直接是 values 数组
 */
export function toHostMessage(
  type: HostMessageType,
  payload: unknown
): Record<string, unknown> {
  if (type === 'settings' && Array.isArray(payload)) {
    return { type, values: payload }
  }
  return isRecord(payload) ? { ...payload, type } : { type }
}

export function getMessagePluginId(message: unknown): string | undefined {
  return isRecord(message) ? optionalString(message.pluginId) : undefined
}

/**
 * 将 TouchPortal 消息转换为插件事件，不认识的类型返回 null
 */
export function parseHostMessage(message: unknown): HostEvent | null {
  if (!isRecord(message)) {
    return null
  }

  const pluginId = optionalString(message.pluginId)

  switch (message.type) {
    case 'info':
      return {
        type: 'connect',
        payload: {
          pluginId,
          sdkVersion: optionalNumber(message.sdkVersion),
          tpVersionString: optionalString(message.tpVersionString),
          tpVersionCode: optionalNumber(message.tpVersionCode),
          pluginVersion: optionalNumber(message.pluginVersion),
          status: optionalString(message.status),
          settings: toSettingsEntries(message.settings),
        },
      }
    case 'settings':
      return {
        type: 'settingUpdate',
        payload: { pluginId, values: toSettingsEntries(message.values) },
      }
    case 'action':
      return {
        type: 'action',
        payload: {
          pluginId,
          actionId: optionalString(message.actionId) ?? '',
          data: toActionData(message.data),
        },
      }
    case 'closePlugin':
      return { type: 'shutdown', payload: { pluginId } }
    default:
      return null
  }
}
