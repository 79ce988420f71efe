import { extractSendMessageFields, getActionDataValue } from '../actionData'

const DESTINATION_ID = 'tp.plugin.websockets.act.sendmessage.data.destination'
const MESSAGE_ID = 'tp.plugin.websockets.act.sendmessage.data.message'

describe('getActionDataValue', () => {
  it('应该按 id 返回字段值', () => {
    const data = [
      { id: 'a', value: '1' },
      { id: 'b', value: '2' },
    ]

    expect(getActionDataValue(data, 'b')).toBe('2')
    expect(getActionDataValue(data, 'c')).toBeUndefined()
  })

  it('重复 id 时应该以最后一个为准', () => {
    const data = [
      { id: 'a', value: 'first' },
      { id: 'a', value: 'last' },
    ]

    expect(getActionDataValue(data, 'a')).toBe('last')
  })
})

describe('extractSendMessageFields', () => {
  it('应该提取目标地址和消息', () => {
    const fields = extractSendMessageFields([
      { id: DESTINATION_ID, value: 'ws://localhost:9000' },
      { id: MESSAGE_ID, value: 'hello' },
    ])

    expect(fields).toEqual({ destination: 'ws://localhost:9000', message: 'hello' })
  })

  it('缺少的字段应该为空字符串', () => {
    expect(
      extractSendMessageFields([{ id: DESTINATION_ID, value: 'ws://localhost:9000' }])
    ).toEqual({ destination: 'ws://localhost:9000', message: '' })
    expect(extractSendMessageFields([{ id: 'other', value: 'x' }])).toEqual({
      destination: '',
      message: '',
    })
  })
})
