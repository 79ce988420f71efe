import packages from '../package.json'
import type {
  PluginAction,
  PluginCategory,
  PluginInfo,
  PluginSetting,
} from './types'

export const PLUGIN_ID = 'tp.plugin.websockets'

export const pluginInfo: PluginInfo = {
  sdk: 3,
  version: packages.version,
  name: 'Websockets',
  id: PLUGIN_ID,
  plugin_start_cmd:
    'node "%TP_PLUGIN_FOLDER%TPWebsockets/dist/src/main.js" @config.txt',
  configuration: {
    colorDark: '#25274c',
    colorLight: '#707ab5',
  },
}

export const pluginSettings = {
  example: {
    name: 'Example Setting',
    type: 'text',
    default: 'Example value',
    readOnly: false,
  },
} satisfies Record<string, PluginSetting>

export const pluginCategories = {
  main: {
    id: `${PLUGIN_ID}.main`,
    name: 'Websockets',
  },
} satisfies Record<string, PluginCategory>

const SEND_MESSAGE_ID = `${PLUGIN_ID}.act.sendmessage`

export const pluginActions = {
  sendmessage: {
    category: 'main',
    id: SEND_MESSAGE_ID,
    name: 'Send Message',
    prefix: pluginCategories.main.name,
    type: 'communicate',
    tryInline: true,
    // $[name] 对应 data id 最后一段，$[1] 对应第一个字段
    format: 'Send the text string $[message] to $[destination]',
    data: {
      destination: {
        id: `${SEND_MESSAGE_ID}.data.destination`,
        type: 'text',
        label: 'Destination',
        default: '<None>',
      },
      message: {
        id: `${SEND_MESSAGE_ID}.data.message`,
        type: 'text',
        label: 'Message',
        default: '<None>',
      },
    },
  },
} satisfies Record<string, PluginAction>

/** 同时执行的事件处理器上限 */
export const MAX_WORKERS = 4
