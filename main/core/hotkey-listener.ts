/**
 * 键盘监听守护
 *
 * 把 KeyEventSource 接到状态机上，监听异常终止时有限次数重启：
 * 第 n 次重启前等待 n × 基准间隔，超过上限后热键功能在本进程内不可用
 */

import type { KeyId } from '../../shared/hotkeys'
import { LISTENER_MAX_RESTARTS, LISTENER_RESTART_BASE_MS } from '../config/constants'
import { EventBus } from './event-bus'
import type { HotkeyStateMachine } from './hotkey-state-machine'
import { createModuleLogger, type Logger } from '../utils/logger'
import { KeyTalkError, toError } from '../utils/errors'

export interface KeyEventHandlers {
  /** 返回 true 表示拦截该事件 */
  onKeyDown(key: KeyId): boolean
  onKeyUp(key: KeyId): boolean
}

/**
 * 原始按键事件源
 * run() 在正常停止时 resolve，异常终止时 reject
 */
export interface KeyEventSource {
  run(handlers: KeyEventHandlers): Promise<void>
  stop(): void
}

export type ListenerStatus = 'stopped' | 'running' | 'restarting' | 'failed'

export type ListenerEvents = {
  started: [attempt: number]
  restarting: [attempt: number, delayMs: number, error: Error]
  fatal: [error: Error]
  stopped: []
}

export interface HotkeyListenerOptions {
  baseDelayMs?: number
  maxRestarts?: number
  sleep?: (ms: number) => Promise<void>
  logger?: Logger
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

export class HotkeyListener {
  readonly events: EventBus<ListenerEvents>

  private status: ListenerStatus = 'stopped'
  private stopRequested = false
  private loop: Promise<void> | null = null

  private readonly baseDelayMs: number
  private readonly maxRestarts: number
  private readonly sleep: (ms: number) => Promise<void>
  private readonly logger: Logger

  constructor(
    private readonly source: KeyEventSource,
    private readonly machine: HotkeyStateMachine,
    options: HotkeyListenerOptions = {}
  ) {
    this.baseDelayMs = options.baseDelayMs ?? LISTENER_RESTART_BASE_MS
    this.maxRestarts = options.maxRestarts ?? LISTENER_MAX_RESTARTS
    this.sleep = options.sleep ?? defaultSleep
    this.logger = options.logger ?? createModuleLogger('hotkey-listener')
    this.events = new EventBus<ListenerEvents>('hotkey-listener', this.logger)
  }

  getStatus(): ListenerStatus {
    return this.status
  }

  /**
   * 启动监听，返回的 Promise 在监听彻底结束（停止或致命失败）时 resolve
   */
  start(): Promise<void> {
    if (this.status === 'failed') {
      this.logger.warn('键盘监听已永久失效，需要重启进程')
      return Promise.resolve()
    }
    if (this.loop) {
      return this.loop
    }

    this.stopRequested = false
    const loop = this.supervise().finally(() => {
      this.loop = null
    })
    this.loop = loop
    return loop
  }

  stop(): void {
    if (!this.loop) return
    this.stopRequested = true
    this.source.stop()
  }

  /**
   * 等待监听结束
   */
  whenStopped(): Promise<void> {
    return this.loop ?? Promise.resolve()
  }

  private async supervise(): Promise<void> {
    const handlers: KeyEventHandlers = {
      onKeyDown: key => this.machine.handleKeyDown(key),
      onKeyUp: key => this.machine.handleKeyUp(key),
    }

    let failures = 0

    while (!this.stopRequested) {
      this.status = 'running'
      this.logger.info('键盘监听已启动', { attempt: failures })
      this.events.emit('started', failures)

      try {
        await this.source.run(handlers)
        break
      } catch (error) {
        const err = toError(error)
        if (this.stopRequested) break

        this.machine.abandonActiveTransmission(err)
        failures++

        if (failures > this.maxRestarts) {
          this.status = 'failed'
          const fatal = new KeyTalkError(
            'LISTENER_FATAL',
            `键盘监听连续失败 ${failures} 次，热键功能不可用`,
            { cause: err }
          )
          this.logger.fatal(fatal, { failures, lastError: err.message })
          this.events.emit('fatal', fatal)
          return
        }

        const delayMs = this.baseDelayMs * failures
        this.status = 'restarting'
        this.logger.warn('键盘监听异常终止，准备重启', { attempt: failures, delayMs, error: err.message })
        this.events.emit('restarting', failures, delayMs, err)
        await this.sleep(delayMs)
      }
    }

    this.status = 'stopped'
    this.logger.info('键盘监听已停止')
    this.events.emit('stopped')
  }
}
