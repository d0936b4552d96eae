/**
 * 结构化日志
 *
 * 开发环境经 pino-pretty 输出到终端，生产环境按天写入日志目录；
 * 各模块通过 createModuleLogger 取得带 module 字段的子日志器
 */

import pino from 'pino'
import path from 'node:path'
import fs from 'node:fs'
import type { TransmissionMode } from '../../shared/hotkeys'
import { getLogsDir } from '../config/paths'

export interface LogContext {
  module?: string
  mode?: TransmissionMode
  context?: string
  [key: string]: unknown
}

export interface LoggerConfig {
  level: pino.Level
  enableFile: boolean
  enableConsole: boolean
}

type MessageLevel = 'info' | 'warn' | 'debug' | 'trace'
type ErrorLevel = 'error' | 'fatal'

const LEVELS: readonly pino.Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace']

function resolveLevel(raw: string | undefined): pino.Level {
  return LEVELS.find(level => level === raw?.toLowerCase()) ?? 'info'
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: resolveLevel(process.env.LOG_LEVEL),
  enableFile: process.env.NODE_ENV === 'production',
  enableConsole: process.env.NODE_ENV !== 'test',
}

function dailyLogFile(): string {
  const logDir = getLogsDir()
  fs.mkdirSync(logDir, { recursive: true })
  const day = new Date().toISOString().slice(0, 10)
  return path.join(logDir, `keytalk-${day}.log`)
}

function createPinoLogger(config: LoggerConfig): pino.Logger {
  const targets: pino.TransportTargetOptions[] = []

  if (config.enableConsole) {
    targets.push({
      target: 'pino-pretty',
      level: config.level,
      options: { colorize: true, translateTime: 'SYS:HH:MM:ss', ignore: 'pid,hostname' },
    })
  }
  if (config.enableFile) {
    targets.push({ target: 'pino/file', level: config.level, options: { destination: dailyLogFile() } })
  }

  // 测试环境两者都关闭
  if (targets.length === 0) {
    return pino({ level: 'silent' })
  }

  return pino({
    level: config.level,
    base: { app: 'KeyTalk' },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: { targets },
  })
}

export class Logger {
  private readonly pino: pino.Logger

  constructor(
    private readonly context: LogContext = {},
    config: LoggerConfig | pino.Logger = DEFAULT_CONFIG
  ) {
    this.pino = 'child' in config ? config : createPinoLogger(config)
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context)
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context)
  }

  /**
   * 逐键事件等高频输出
   */
  trace(message: string, context?: LogContext): void {
    this.write('trace', message, context)
  }

  error(error: Error | string, context?: LogContext): void {
    this.report('error', error, context)
  }

  /**
   * 不可恢复的状况，例如按键监听重启次数耗尽
   */
  fatal(error: Error | string, context?: LogContext): void {
    this.report('fatal', error, context)
  }

  child(context: LogContext): Logger {
    return new Logger({ ...this.context, ...context }, this.pino)
  }

  /**
   * 返回结束函数，调用时记录耗时并返回毫秒数
   */
  startTimer(label: string): () => number {
    const startedAt = performance.now()
    return () => {
      const durationMs = Math.round(performance.now() - startedAt)
      this.info(`${label}完成`, { durationMs })
      return durationMs
    }
  }

  private write(level: MessageLevel, message: string, context?: LogContext): void {
    this.pino[level]({ ...this.context, ...context }, message)
  }

  private report(level: ErrorLevel, error: Error | string, context?: LogContext): void {
    if (typeof error === 'string') {
      this.pino[level]({ ...this.context, ...context }, error)
      return
    }
    this.pino[level]({ err: error, ...this.context, ...context }, error.message)
  }
}

const rootLogger = new Logger({ module: 'main' })

export function createModuleLogger(moduleName: string): Logger {
  return rootLogger.child({ module: moduleName })
}
