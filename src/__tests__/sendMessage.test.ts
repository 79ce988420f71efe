import type { EventEmitter } from 'events'
import { sendMessage } from '../sendMessage'
import { quietLogger } from './helpers/testUtils'

// Mock WebSocket: 构造后异步 open，close 后异步触发 close 事件
jest.mock('ws', () => {
  const { EventEmitter } = jest.requireActual<typeof import('events')>('events')

  class MockWebSocket extends EventEmitter {
    static CONNECTING = 0
    static OPEN = 1
    static CLOSING = 2
    static CLOSED = 3
    static instances: MockWebSocket[] = []
    static connectError: Error | null = null
    static sendError: Error | null = null
    // error 时仍停留在 CONNECTING，由调用方负责 terminate
    static connectingError: Error | null = null

    readyState = MockWebSocket.CONNECTING

    send = jest.fn((_data: string, cb: (err?: Error) => void) => {
      setImmediate(() => cb(MockWebSocket.sendError ?? undefined))
    })

    close = jest.fn(() => this.finishClose(1000))

    terminate = jest.fn(() => this.finishClose(1006))

    constructor(public url: string) {
      super()
      MockWebSocket.instances.push(this)
      setImmediate(() => {
        if (MockWebSocket.connectingError) {
          this.emit('error', MockWebSocket.connectingError)
          return
        }
        const error = MockWebSocket.connectError
        if (error) {
          this.readyState = MockWebSocket.CLOSING
          this.emit('error', error)
          this.readyState = MockWebSocket.CLOSED
          this.emit('close', 1006)
          return
        }
        this.readyState = MockWebSocket.OPEN
        this.emit('open')
      })
    }

    private finishClose(code: number) {
      this.readyState = MockWebSocket.CLOSING
      setImmediate(() => {
        this.readyState = MockWebSocket.CLOSED
        this.emit('close', code)
      })
    }
  }

  return { WebSocket: MockWebSocket }
})

interface MockSocket extends EventEmitter {
  url: string
  readyState: number
  send: jest.Mock
  close: jest.Mock
  terminate: jest.Mock
}

interface MockWebSocketClass {
  instances: MockSocket[]
  connectError: Error | null
  sendError: Error | null
  connectingError: Error | null
}

const MockWebSocket = jest.requireMock<{ WebSocket: MockWebSocketClass }>('ws').WebSocket

describe('sendMessage', () => {
  const logger = quietLogger()

  beforeEach(() => {
    MockWebSocket.instances.length = 0
    MockWebSocket.connectError = null
    MockWebSocket.sendError = null
    MockWebSocket.connectingError = null
  })

  it('应该连接目标地址、发送一帧消息后关闭', async () => {
    await sendMessage('ws://localhost:9000', 'hello', logger)

    expect(MockWebSocket.instances).toHaveLength(1)
    const [socket] = MockWebSocket.instances
    expect(socket.url).toBe('ws://localhost:9000')
    expect(socket.send).toHaveBeenCalledTimes(1)
    expect(socket.send).toHaveBeenCalledWith('hello', expect.any(Function))
    expect(socket.close).toHaveBeenCalledTimes(1)
    expect(socket.terminate).not.toHaveBeenCalled()
    expect(socket.readyState).toBe(3)
  })

  it('应该原样发送空消息', async () => {
    await sendMessage('ws://localhost:9000', '', logger)

    expect(MockWebSocket.instances[0].send).toHaveBeenCalledWith('', expect.any(Function))
  })

  it('连接失败时应该抛出错误且不发送', async () => {
    MockWebSocket.connectError = new Error('connect ECONNREFUSED 127.0.0.1:9000')

    await expect(sendMessage('ws://localhost:9000', 'hello', logger)).rejects.toThrow(
      'connect ECONNREFUSED 127.0.0.1:9000'
    )

    const [socket] = MockWebSocket.instances
    expect(socket.send).not.toHaveBeenCalled()
    // 连接已经关闭，不需要再次 close
    expect(socket.close).not.toHaveBeenCalled()
    expect(socket.readyState).toBe(3)
    expect(socket.listenerCount('open')).toBe(0)
  })

  it('仍在连接中时失败应该 terminate 连接', async () => {
    MockWebSocket.connectingError = new Error('Opening handshake has timed out')

    await expect(sendMessage('ws://localhost:9000', 'hello', logger)).rejects.toThrow(
      'Opening handshake has timed out'
    )

    const [socket] = MockWebSocket.instances
    expect(socket.send).not.toHaveBeenCalled()
    expect(socket.terminate).toHaveBeenCalledTimes(1)
    expect(socket.close).not.toHaveBeenCalled()
    expect(socket.readyState).toBe(3)
  })

  it('发送失败时也应该关闭连接', async () => {
    MockWebSocket.sendError = new Error('send failed')

    await expect(sendMessage('ws://localhost:9000', 'hello', logger)).rejects.toThrow(
      'send failed'
    )

    const [socket] = MockWebSocket.instances
    expect(socket.close).toHaveBeenCalledTimes(1)
    expect(socket.readyState).toBe(3)
  })

  it('相同的调用应该建立两个独立连接', async () => {
    await sendMessage('ws://localhost:9000', 'hello', logger)
    await sendMessage('ws://localhost:9000', 'hello', logger)

    expect(MockWebSocket.instances).toHaveLength(2)
    expect(MockWebSocket.instances[0]).not.toBe(MockWebSocket.instances[1])
    MockWebSocket.instances.forEach((socket) => {
      expect(socket.send).toHaveBeenCalledTimes(1)
      expect(socket.close).toHaveBeenCalledTimes(1)
    })
  })
})
