import type { HotkeyBindings } from './hotkeys'

/**
 * 当前启用的 LLM 提供方，由配置决定，与传输模式无关
 */
export type LlmProviderId = 'openrouter' | 'ollama'

export interface OpenRouterConfig {
  apiKey: string
  baseUrl: string
  model: string
  systemPrompt: string
  temperature: number
  maxTokens: number
  timeoutMs: number
}

export interface OllamaConfig {
  serverUrl: string
  model: string
  systemPrompt: string
  timeoutMs: number
}

export interface LlmSettings {
  provider: LlmProviderId
  openRouter: OpenRouterConfig
  ollama: OllamaConfig
}

/**
 * OpenAI 兼容的在线转写配置
 */
export interface TranscriptionConfig {
  apiKey: string
  baseUrl: string
  modelId: string
  language?: string
  timeoutMs: number
}

export interface RecorderConfig {
  sampleRate: number
  channels: number
}

export type NotificationKind = 'speechToText' | 'llmResponse'

export interface NotificationConfig {
  enabled: boolean
  /** 提示音文件路径，为空则不播放 */
  soundFile: string
  /** 音量 0..1 */
  volume: number
  playOnSpeechToText: boolean
  playOnLlmResponse: boolean
}

export interface HistoryConfig {
  enabled: boolean
  /** 保留录音文件，不在流程结束后删除 */
  retainRecordings: boolean
  /** 历史保留天数，0 表示不清理 */
  retentionDays: number
}

export interface TtsConfig {
  enabled: boolean
  maxTextLength: number
}

export interface VisionConfig {
  enabled: boolean
  systemPrompt: string
}

export interface AppSettings {
  hotkeys: HotkeyBindings
  llm: LlmSettings
  transcription: TranscriptionConfig
  recorder: RecorderConfig
  notification: NotificationConfig
  history: HistoryConfig
  tts: TtsConfig
  vision: VisionConfig
}

export type AppSettingsPatch = { [K in keyof AppSettings]?: Partial<AppSettings[K]> }
