import { HostLink } from './HostLink'
import { PluginSettings } from './PluginSettings'
import { extractSendMessageFields } from './actionData'
import { PLUGIN_ID, pluginActions } from './constants'
import { logger as rootLogger, type Logger } from './logger'
import { sendMessage, type SendMessage } from './sendMessage'
import type { ActionPayload, ConnectPayload, SettingUpdatePayload } from './types'

export interface WebsocketsPluginOptions {
  maxWorkers?: number
  logger?: Logger
  send?: SendMessage
}

export interface WebsocketsPlugin {
  link: HostLink
  settings: PluginSettings
  connect: () => Promise<void>
  disconnect: () => void
}

export function createWebsocketsPlugin(
  options: WebsocketsPluginOptions = {}
): WebsocketsPlugin {
  const logger = options.logger ?? rootLogger
  const send: SendMessage =
    options.send ?? ((destination, message) => sendMessage(destination, message, logger))
  const settings = new PluginSettings()
  const link = new HostLink({
    pluginId: PLUGIN_ID,
    maxWorkers: options.maxWorkers,
    autoClose: true,
    checkPluginId: true,
    logger,
  })

  link.on('connect', (data: ConnectPayload) => {
    logger.info(
      `Connected to TP v${data.tpVersionString ?? '?'}, plugin v${data.pluginVersion ?? '?'}.`
    )
    logger.debug(`Connection: ${JSON.stringify(data)}`)
    if (data.settings.length > 0) {
      settings.update(data.settings)
    }
  })

  link.on('settingUpdate', (data: SettingUpdatePayload) => {
    logger.debug(`Settings: ${JSON.stringify(data)}`)
    if (data.values.length > 0) {
      settings.update(data.values)
    }
  })

  link.on('action', async (data: ActionPayload) => {
    logger.debug(`Action: ${JSON.stringify(data)}`)
    // 缺少 actionId 或 data 的消息直接忽略
    if (!data.actionId || data.data.length === 0) {
      return
    }

    if (data.actionId !== pluginActions.sendmessage.id) {
      logger.warn(`Got unknown action ID: ${data.actionId}`)
      return
    }

    const { destination, message } = extractSendMessageFields(data.data)
    logger.info(`Sending message to ${destination}: ${message}`)

    // 发送失败不在这里处理，交给 HostLink 的 error 回调
    await send(destination, message)
  })

  link.on('shutdown', () => {
    logger.info('Received shutdown event from TP Client.')
  })

  link.on('error', (error: Error) => {
    logger.error(`Error in TP Client event handler: ${error.message}`)
  })

  return {
    link,
    settings,
    connect: () => link.connect(),
    disconnect: () => link.disconnect(),
  }
}
