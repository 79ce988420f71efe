import { WebSocket } from 'ws'
import { logger as rootLogger, type Logger } from './logger'

export type SendMessage = (destination: string, message: string) => Promise<void>

/**
 * 建立一次性 WebSocket 连接，发送一帧文本后关闭。
 * 每次调用都是独立连接，连接在任何退出路径上都会被释放。
 */
export async function sendMessage(
  destination: string,
  message: string,
  logger: Logger = rootLogger
): Promise<void> {
  const ws = new WebSocket(destination)

  // 保持监听，关闭阶段的错误不会变成未处理的 error 事件
  ws.on('error', (error) => {
    logger.debug(`WebSocket ${destination} error: ${error.message}`)
  })

  try {
    await waitForOpen(ws)
    await sendFrame(ws, message)
    logger.debug(`Sent ${message.length} chars to ${destination}`)
  } finally {
    await closeSocket(ws)
  }
}

function waitForOpen(ws: WebSocket): Promise<void> {
  return new Promise((resolve, reject) => {
    const onOpen = () => {
      ws.off('error', onError)
      resolve()
    }
    const onError = (error: Error) => {
      ws.off('open', onOpen)
      reject(error)
    }

    ws.once('open', onOpen)
    ws.once('error', onError)
  })
}

function sendFrame(ws: WebSocket, message: string): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.send(message, (error) => {
      if (error) {
        reject(error)
        return
      }
      resolve()
    })
  })
}

function closeSocket(ws: WebSocket): Promise<void> {
  return new Promise((resolve) => {
    if (ws.readyState === WebSocket.CLOSED) {
      resolve()
      return
    }

    ws.once('close', () => resolve())

    if (ws.readyState === WebSocket.OPEN) {
      ws.close()
    } else if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate()
    }
  })
}
