#!/usr/bin/env node
import { createWriteStream, type WriteStream } from 'fs'
import type { Writable } from 'stream'
import { parseCliOptions } from './cli'
import { pluginInfo } from './constants'
import { createWebsocketsPlugin } from './createWebsocketsPlugin'
import { writeEntry } from './entry'
import { logger, toError } from './logger'

async function main(): Promise<number> {
  const options = parseCliOptions(process.argv.slice(2))

  if (options.entryFile) {
    writeEntry(options.entryFile)
    console.log(`Wrote ${options.entryFile}`)
    return 0
  }

  const outputs: Writable[] = []
  let logFile: WriteStream | null = null
  if (options.logStream) {
    outputs.push(options.logStream === 'stderr' ? process.stderr : process.stdout)
  }
  if (options.logFile) {
    logFile = createWriteStream(options.logFile, { flags: 'a' })
    outputs.push(logFile)
  }
  logger.configure({ level: options.logLevel, outputs })

  logger.info(`Starting ${pluginInfo.name} v${pluginInfo.version} on ${process.platform}.`)

  const plugin = createWebsocketsPlugin()
  let ret = 0

  // 优雅关闭
  const stop = (signal: string) => {
    logger.warn(`${signal} received, exiting.`)
    plugin.disconnect()
  }
  process.on('SIGINT', () => stop('SIGINT'))
  process.on('SIGTERM', () => stop('SIGTERM'))

  try {
    // 连接成功后一直阻塞到断开
    await plugin.connect()
    logger.info('TP Client closed.')
  } catch (e) {
    const error = toError(e)
    logger.error(`Exception in TP Client:\n${error.stack ?? error.message}`)
    ret = 1
  } finally {
    plugin.disconnect()
  }

  logger.info(`${pluginInfo.name} stopped.`)
  // process.exit 前等日志文件写完
  await new Promise<void>((resolve) => (logFile ? logFile.end(() => resolve()) : resolve()))

  return ret
}

main()
  .then((code) => {
    process.exit(code)
  })
  .catch((e) => {
    console.error(e)
    process.exit(1)
  })
