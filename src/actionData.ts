import { pluginActions } from './constants'
import type { ActionDataItem } from './types'

export interface SendMessageFields {
  destination: string
  message: string
}

/**
 * 在 action data 中按 id 查找字段值，重复 id 以最后一个为准
 */
export function getActionDataValue(
  data: ActionDataItem[],
  id: string
): string | undefined {
  let value: string | undefined
  for (const item of data) {
    if (item.id === id) {
      value = item.value
    }
  }
  return value
}

export function extractSendMessageFields(
  data: ActionDataItem[]
): SendMessageFields {
  const fields = pluginActions.sendmessage.data

  return {
    destination: getActionDataValue(data, fields.destination.id) ?? '',
    message: getActionDataValue(data, fields.message.id) ?? '',
  }
}
