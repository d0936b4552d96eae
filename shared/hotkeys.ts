/**
 * 热键与传输模式定义
 *
 * 状态机、监听器与展示层共享
 */

/** 按键标识，例如 'F1'、'ShiftLeft'、'ControlRight' */
export type KeyId = string

export const MODIFIER_KEYS = [
  'ShiftLeft',
  'ShiftRight',
  'ControlLeft',
  'ControlRight',
  'AltLeft',
  'AltRight',
] as const

export type ModifierKey = typeof MODIFIER_KEYS[number]

export function isModifierKey(key: KeyId): key is ModifierKey {
  return MODIFIER_KEYS.some(modifier => modifier === key)
}

export const CONTROL_KEYS: readonly ModifierKey[] = ['ControlLeft', 'ControlRight']
export const SHIFT_KEYS: readonly ModifierKey[] = ['ShiftLeft', 'ShiftRight']

/**
 * 传输模式
 * - plain: 语音 → 剪贴板
 * - prompt: 语音 → LLM → 剪贴板
 * - copyPrompt: 语音 + 剪贴板内容 → LLM → 剪贴板
 * - visionHold: 语音 + 截图 → LLM → 剪贴板（按住）
 * - visionImmediate: 截图 → LLM → 剪贴板（单击）
 * - ttsImmediate: 剪贴板 → 朗读（单击，带防抖）
 */
export type TransmissionMode =
  | 'plain'
  | 'prompt'
  | 'copyPrompt'
  | 'visionHold'
  | 'visionImmediate'
  | 'ttsImmediate'

/** 需要按住的模式，会占用唯一的传输槽位 */
export type HeldMode = Extract<TransmissionMode, 'plain' | 'prompt' | 'copyPrompt' | 'visionHold'>

/** 单击即触发的模式，不占用传输槽位 */
export type ImmediateMode = Extract<TransmissionMode, 'visionImmediate' | 'ttsImmediate'>

export const AUGMENTED_MODES: readonly HeldMode[] = ['prompt', 'copyPrompt', 'visionHold']

export function isAugmentedMode(mode: TransmissionMode): boolean {
  return AUGMENTED_MODES.some(item => item === mode)
}

export type TransmissionState =
  | { kind: 'idle' }
  | { kind: 'active'; mode: HeldMode; key: KeyId; startedAt: number }

export interface HotkeyBindings {
  trigger1: KeyId
  trigger2: KeyId
  trigger3: KeyId
}

export const DEFAULT_HOTKEY_BINDINGS: HotkeyBindings = {
  trigger1: 'F1',
  trigger2: 'F2',
  trigger3: 'F3',
}
