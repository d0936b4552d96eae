/**
 * KeyTalk 常量定义
 *
 * 包含时序参数、默认提供方地址与提示文案
 */

/** 两次朗读触发之间的最小间隔（毫秒） */
export const TTS_DEBOUNCE_MS = 200

/** 停止录音后等待文件落盘的时间（毫秒） */
export const SETTLE_DELAY_MS = 1000

/** 键盘监听重启基准间隔，第 n 次重启等待 n 倍 */
export const LISTENER_RESTART_BASE_MS = 1000

export const LISTENER_MAX_RESTARTS = 3

export const NO_SPEECH_MESSAGE = 'No speech detected'

export const LLM_NOT_CONFIGURED_MESSAGE = 'LLM provider is not configured'

export const VISION_CANCELLED_MESSAGE = 'Vision capture was cancelled'

export const PROVIDER_DEFAULTS = {
  openRouter: {
    baseUrl: 'https://openrouter.ai/api/v1',
    model: 'openai/gpt-4o-mini',
    temperature: 0.7,
    maxTokens: 1000,
  },
  ollama: {
    serverUrl: 'http://localhost:11434',
    model: 'llama3.2',
  },
  transcription: {
    baseUrl: 'https://api.openai.com/v1',
    modelId: 'whisper-1',
  },
  timeoutMs: 60000,
} as const

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful assistant. Answer the user request concisely. Reply with plain text that can be pasted directly.'

export const DEFAULT_VISION_PROMPT = 'Describe the image in a single line paragraph'

/** 剪贴板朗读的默认最大字符数 */
export const DEFAULT_TTS_MAX_TEXT_LENGTH = 5000

export const DEFAULT_RETENTION_DAYS = 30
