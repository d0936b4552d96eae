/**
 * KeyTalk 键盘钩子服务
 *
 * 使用 uiohook-napi 实现全局键盘监听，作为 HotkeyListener 的事件源
 * uiohook 无法阻止事件传递给前台应用，拦截标记只记录在日志中
 * uiohook 不报告运行中的钩子失效，能观察到的异常只有 start() 失败和按键处理抛错
 */

import { uIOhook, UiohookKey, type UiohookKeyboardEvent } from 'uiohook-napi'
import type { KeyId } from '../../shared/hotkeys'
import type { KeyEventHandlers, KeyEventSource } from '../core/hotkey-listener'
import { createModuleLogger, type Logger } from '../utils/logger'
import { toError } from '../utils/errors'

/**
 * uiohook 修饰键名称到 KeyId 的映射（左右区分）
 */
const MODIFIER_NAMES: Record<string, KeyId> = {
  Ctrl: 'ControlLeft',
  CtrlRight: 'ControlRight',
  Shift: 'ShiftLeft',
  ShiftRight: 'ShiftRight',
  Alt: 'AltLeft',
  AltRight: 'AltRight',
  Meta: 'MetaLeft',
  MetaRight: 'MetaRight',
}

/**
 * keycode → KeyId，由 UiohookKey 反向生成
 */
export function buildKeycodeTable(): Map<number, KeyId> {
  const table = new Map<number, KeyId>()
  for (const [name, code] of Object.entries(UiohookKey)) {
    if (table.has(code)) continue
    table.set(code, MODIFIER_NAMES[name] ?? name)
  }
  return table
}

export class UiohookKeyEventSource implements KeyEventSource {
  private readonly keycodes = buildKeycodeTable()
  private handlers: KeyEventHandlers | null = null
  private settle: { resolve: () => void; reject: (error: Error) => void } | null = null

  constructor(private readonly logger: Logger = createModuleLogger('keyboard-hook')) {}

  run(handlers: KeyEventHandlers): Promise<void> {
    if (this.settle) {
      return Promise.reject(new Error('键盘钩子已经在运行中'))
    }

    return new Promise<void>((resolve, reject) => {
      this.handlers = handlers
      uIOhook.on('keydown', this.handleKeyDown)
      uIOhook.on('keyup', this.handleKeyUp)

      try {
        uIOhook.start()
      } catch (error) {
        this.detach()
        this.logger.warn('键盘钩子启动失败，请检查辅助功能权限')
        reject(toError(error))
        return
      }

      this.settle = { resolve, reject }
      this.logger.info('键盘钩子已启动')
    })
  }

  stop(): void {
    const settle = this.settle
    if (!settle) return

    this.detach()
    try {
      uIOhook.stop()
    } catch (error) {
      settle.reject(toError(error))
      return
    }
    this.logger.info('键盘钩子已停止')
    settle.resolve()
  }

  /**
   * 按键处理抛错时结束本次运行，交给 HotkeyListener 重启
   */
  private fail(error: Error): void {
    const settle = this.settle
    if (!settle) return

    this.detach()
    try {
      uIOhook.stop()
    } catch (stopError) {
      this.logger.warn('停止失效的键盘钩子时出错', { error: toError(stopError).message })
    }
    settle.reject(error)
  }

  resolveKey(keycode: number): KeyId | undefined {
    return this.keycodes.get(keycode)
  }

  private detach(): void {
    uIOhook.off('keydown', this.handleKeyDown)
    uIOhook.off('keyup', this.handleKeyUp)
    this.handlers = null
    this.settle = null
  }

  private dispatch(type: 'keydown' | 'keyup', keycode: number): void {
    const key = this.resolveKey(keycode)
    const handlers = this.handlers
    if (!key || !handlers) return

    let suppress: boolean
    try {
      suppress = type === 'keydown' ? handlers.onKeyDown(key) : handlers.onKeyUp(key)
    } catch (error) {
      this.logger.error(toError(error), { context: 'key-handler', key, type })
      this.fail(toError(error))
      return
    }
    if (suppress) {
      this.logger.trace('按键已被热键占用', { key, type })
    }
  }

  private handleKeyDown = (e: UiohookKeyboardEvent): void => {
    this.dispatch('keydown', e.keycode)
  }

  private handleKeyUp = (e: UiohookKeyboardEvent): void => {
    this.dispatch('keyup', e.keycode)
  }
}
