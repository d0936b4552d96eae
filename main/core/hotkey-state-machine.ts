/**
 * KeyTalk 热键状态机
 *
 * 根据原始按键事件与当前按住的修饰键判断传输模式的开始与结束。
 * 不做任何 I/O，所有判断在单次事件回调内同步完成。
 */

import {
  CONTROL_KEYS,
  DEFAULT_HOTKEY_BINDINGS,
  SHIFT_KEYS,
  isModifierKey,
  type HeldMode,
  type HotkeyBindings,
  type KeyId,
  type ModifierKey,
  type TransmissionState,
} from '../../shared/hotkeys'
import { TTS_DEBOUNCE_MS } from '../config/constants'
import { EventBus } from './event-bus'
import { createModuleLogger, type Logger } from '../utils/logger'

export type HotkeyEvents = {
  transmissionStarted: [mode: HeldMode, startedAt: number]
  transmissionEnded: [mode: HeldMode, durationMs: number]
  transmissionAbandoned: [mode: HeldMode, reason: Error]
  ttsTriggered: [at: number]
  visionCaptureStarted: [at: number]
}

export interface HotkeyStateMachineOptions {
  bindings?: HotkeyBindings
  /** 事件时间戳（纪元毫秒） */
  now?: () => number
  /** 防抖与按住时长使用的单调时钟，未指定时沿用 now，两者都未指定时为 performance.now */
  monotonic?: () => number
  debounceMs?: number
  logger?: Logger
}

export class HotkeyStateMachine {
  readonly events: EventBus<HotkeyEvents>

  private state: TransmissionState = { kind: 'idle' }
  private readonly modifiers = new Set<ModifierKey>()
  private bindings: HotkeyBindings
  private pendingBindings: HotkeyBindings | null = null
  private lastTtsAt: number | null = null
  private activeSince = 0

  private readonly now: () => number
  private readonly monotonic: () => number
  private readonly debounceMs: number
  private readonly logger: Logger

  constructor(options: HotkeyStateMachineOptions = {}) {
    this.bindings = { ...(options.bindings ?? DEFAULT_HOTKEY_BINDINGS) }
    this.now = options.now ?? Date.now
    this.monotonic = options.monotonic ?? options.now ?? (() => performance.now())
    this.debounceMs = options.debounceMs ?? TTS_DEBOUNCE_MS
    this.logger = options.logger ?? createModuleLogger('hotkey-state-machine')
    this.events = new EventBus<HotkeyEvents>('hotkeys', this.logger)
  }

  getState(): TransmissionState {
    return { ...this.state }
  }

  getBindings(): HotkeyBindings {
    return { ...this.bindings }
  }

  heldModifiers(): ModifierKey[] {
    return [...this.modifiers]
  }

  /**
   * 更新触发键，传输进行中时延迟到回到空闲后生效
   */
  updateBindings(bindings: HotkeyBindings): void {
    if (this.state.kind === 'active') {
      this.pendingBindings = { ...bindings }
      this.logger.info('传输进行中，触发键更新将在空闲后生效', { ...bindings })
      return
    }
    this.bindings = { ...bindings }
    this.logger.info('触发键已更新', { ...bindings })
  }

  /**
   * 处理按键按下，返回是否拦截该事件
   */
  handleKeyDown(key: KeyId): boolean {
    if (isModifierKey(key)) {
      this.modifiers.add(key)
      return false
    }

    const { trigger1, trigger2, trigger3 } = this.bindings
    const control = this.isHeld(CONTROL_KEYS)
    const shift = this.isHeld(SHIFT_KEYS)

    if (key === trigger1) {
      if (control) {
        this.triggerTts()
        return true
      }
      this.tryStart('plain', key)
      return true
    }

    if (key === trigger2) {
      if (shift) {
        this.tryStart('prompt', key)
        return true
      }
      if (control) {
        this.tryStart('copyPrompt', key)
        return true
      }
      return false
    }

    if (key === trigger3) {
      if (shift) {
        const at = this.now()
        this.logger.debug('截图描述触发', { at })
        this.events.emit('visionCaptureStarted', at)
        return true
      }
      if (control) {
        this.tryStart('visionHold', key)
        return true
      }
      return false
    }

    return false
  }

  /**
   * 处理按键释放，返回是否拦截该事件
   */
  handleKeyUp(key: KeyId): boolean {
    if (isModifierKey(key)) {
      this.modifiers.delete(key)
      return false
    }

    const { trigger1, trigger2, trigger3 } = this.bindings

    if (key === trigger1) {
      // Trigger-1 + Control 是朗读模式，裸 Trigger-1 释放不能在 Control 按住时结束录音
      if (this.isHeld(CONTROL_KEYS)) return false
      if (this.isActive(key, ['plain'])) {
        this.endActive()
      }
      return true
    }

    if (key === trigger2 && this.isActive(key, ['prompt', 'copyPrompt'])) {
      this.endActive()
      return true
    }

    if (key === trigger3 && this.isActive(key, ['visionHold'])) {
      this.endActive()
      return true
    }

    return false
  }

  /**
   * 监听器异常终止时遗弃进行中的传输
   * 修饰键集合保持不变，只能由后续的释放事件逐个清除
   */
  abandonActiveTransmission(reason: Error): boolean {
    if (this.state.kind !== 'active') return false

    const { mode } = this.state
    this.state = { kind: 'idle' }
    this.applyPendingBindings()

    this.logger.error(reason, {
      context: 'orphaned-transmission',
      mode,
      heldForMs: Math.round(this.monotonic() - this.activeSince),
    })
    this.events.emit('transmissionAbandoned', mode, reason)
    return true
  }

  private isHeld(keys: readonly ModifierKey[]): boolean {
    return keys.some(key => this.modifiers.has(key))
  }

  private isActive(key: KeyId, modes: readonly HeldMode[]): boolean {
    return this.state.kind === 'active' && this.state.key === key && modes.includes(this.state.mode)
  }

  private tryStart(mode: HeldMode, key: KeyId): void {
    if (this.state.kind === 'active') {
      this.logger.debug('已有传输进行中，忽略', { requested: mode, active: this.state.mode })
      return
    }

    const startedAt = this.now()
    this.activeSince = this.monotonic()
    this.state = { kind: 'active', mode, key, startedAt }
    this.logger.info('传输开始', { mode, key })
    this.events.emit('transmissionStarted', mode, startedAt)
  }

  private endActive(): void {
    if (this.state.kind !== 'active') return

    const { mode } = this.state
    const durationMs = Math.round(this.monotonic() - this.activeSince)
    this.state = { kind: 'idle' }
    this.applyPendingBindings()

    this.logger.info('传输结束', { mode, durationMs })
    this.events.emit('transmissionEnded', mode, durationMs)
  }

  private triggerTts(): void {
    const tick = this.monotonic()
    if (this.lastTtsAt !== null && tick - this.lastTtsAt < this.debounceMs) {
      this.logger.debug('朗读触发过于频繁，已丢弃', { sinceLastMs: Math.round(tick - this.lastTtsAt) })
      return
    }
    this.lastTtsAt = tick
    this.events.emit('ttsTriggered', this.now())
  }

  private applyPendingBindings(): void {
    if (!this.pendingBindings) return
    this.bindings = this.pendingBindings
    this.pendingBindings = null
    this.logger.info('延迟的触发键更新已生效', { ...this.bindings })
  }
}
