import { Client as TouchPortalClient } from 'touchportal-api'
import { MAX_WORKERS } from './constants'
import {
  getMessagePluginId,
  parseHostMessage,
  toHostMessage,
  type HostMessageType,
} from './hostMessages'
import { logger as rootLogger, toError, type Logger } from './logger'
import type {
  HostEvent,
  HostEventHandlers,
  HostEventMap,
  HostEventType,
} from './types'

export interface HostLinkOptions {
  pluginId: string
  /** 同时执行的事件处理器上限 */
  maxWorkers?: number
  /** 收到 ClosePlugin 后自动断开 */
  autoClose?: boolean
  /** 忽略 pluginId 不匹配的消息 */
  checkPluginId?: boolean
  logger?: Logger
}

/**
 * HostLink 用到的 TouchPortalClient 能力
 */
export interface TouchPortalConnection {
  on(event: string, listener: (payload: unknown) => void): unknown
  connect(options: { pluginId: string }): unknown
  disconnect?(): unknown
}

// TouchPortalClient 事件 => 插件协议消息类型
const CLIENT_EVENTS: Array<[string, HostMessageType]> = [
  ['Info', 'info'],
  ['Settings', 'settings'],
  ['Action', 'action'],
  ['ClosePlugin', 'closePlugin'],
]

type Task = () => Promise<void>

/**
 * 基于 touchportal-api 的适配层: 类型化的事件处理表 + 有界并发
 */
export class HostLink {
  readonly pluginId: string
  private maxWorkers: number
  private autoClose: boolean
  private checkPluginId: boolean
  private logger: Logger
  private handlers: HostEventHandlers = {}
  private client: TouchPortalConnection | null = null
  private settle: ((error?: Error) => void) | null = null
  private active = 0
  private pending: Task[] = []

  constructor(options: HostLinkOptions) {
    this.pluginId = options.pluginId
    this.maxWorkers = Math.max(1, options.maxWorkers ?? MAX_WORKERS)
    this.autoClose = options.autoClose ?? true
    this.checkPluginId = options.checkPluginId ?? true
    this.logger = options.logger ?? rootLogger
  }

  on<K extends HostEventType>(
    type: K,
    handler: NonNullable<HostEventHandlers[K]>
  ): this {
    this.handlers[type] = handler
    return this
  }

  get connected(): boolean {
    return this.client !== null
  }

  /**
   * 连接 TouchPortal 并配对，直到断开才 resolve
   */
  connect(): Promise<void> {
    if (this.client) {
      return Promise.reject(new Error('HostLink is already connected'))
    }

    const client: TouchPortalConnection = new TouchPortalClient()
    this.client = client

    CLIENT_EVENTS.forEach(([event, type]) => {
      client.on(event, (payload) => this.receive(type, payload))
    })
    client.on('error', (error) => {
      const failure = toError(error)
      this.logger.error(`TouchPortal client error: ${failure.message}`)
      this.close(failure)
    })

    return new Promise((resolve, reject) => {
      this.settle = (error) => (error ? reject(error) : resolve())
      try {
        client.connect({ pluginId: this.pluginId })
      } catch (error) {
        this.close(toError(error))
      }
    })
  }

  disconnect(): void {
    this.close()
  }

  /**
   * 分发一个事件，返回值在处理器执行完成后 resolve
   */
  dispatch(event: HostEvent): Promise<void> {
    switch (event.type) {
      case 'connect': {
        const { payload } = event
        return this.schedule(() => this.invoke('connect', payload))
      }
      case 'settingUpdate': {
        const { payload } = event
        return this.schedule(() => this.invoke('settingUpdate', payload))
      }
      case 'action': {
        const { payload } = event
        return this.schedule(() => this.invoke('action', payload))
      }
      case 'shutdown': {
        const { payload } = event
        return this.schedule(() => this.invoke('shutdown', payload)).then(() => {
          if (this.autoClose) {
            this.disconnect()
          }
        })
      }
    }
  }

  private close(error?: Error): void {
    const client = this.client
    if (!client) {
      return
    }
    this.client = null
    client.disconnect?.()
    this.logger.debug('TouchPortal connection closed')

    const settle = this.settle
    this.settle = null
    settle?.(error)
  }

  private receive(type: HostMessageType, payload: unknown): void {
    const message = toHostMessage(type, payload)

    const pluginId = getMessagePluginId(message)
    if (this.checkPluginId && pluginId !== undefined && pluginId !== this.pluginId) {
      this.logger.warn(`Ignoring message for plugin ${pluginId}`)
      return
    }

    const event = parseHostMessage(message)
    if (!event) {
      this.logger.debug(`Ignoring message: ${type}`)
      return
    }

    void this.dispatch(event)
  }

  private async invoke<K extends Exclude<HostEventType, 'error'>>(
    type: K,
    payload: HostEventMap[K]
  ): Promise<void> {
    const handler = this.handlers[type]
    if (handler) {
      await handler(payload)
    }
  }

  private schedule(task: Task): Promise<void> {
    return new Promise((resolve) => {
      this.pending.push(async () => {
        try {
          await task()
        } catch (error) {
          this.reportError(error)
        } finally {
          resolve()
        }
      })
      this.drain()
    })
  }

  private drain(): void {
    while (this.active < this.maxWorkers && this.pending.length > 0) {
      const next = this.pending.shift()
      if (!next) {
        return
      }
      this.active++
      void next().finally(() => {
        this.active--
        this.drain()
      })
    }
  }

  private reportError(error: unknown): void {
    const handler = this.handlers.error
    if (!handler) {
      this.logger.error(`Unhandled error in event handler: ${toError(error).message}`)
      return
    }

    try {
      const result = handler(toError(error))
      if (result instanceof Promise) {
        result.catch((handlerError: unknown) => {
          this.logger.error(`Error handler failed: ${toError(handlerError).message}`)
        })
      }
    } catch (handlerError) {
      this.logger.error(`Error handler failed: ${toError(handlerError).message}`)
    }
  }
}
