import fs from 'node:fs'
import path from 'node:path'
import type { AppSettings, AppSettingsPatch, LlmProviderId } from '../../shared/app-state'
import { DEFAULT_HOTKEY_BINDINGS } from '../../shared/hotkeys'
import { getConfigDir, getBundledConfigDir } from './paths'
import {
  DEFAULT_RETENTION_DAYS,
  DEFAULT_SYSTEM_PROMPT,
  DEFAULT_TTS_MAX_TEXT_LENGTH,
  DEFAULT_VISION_PROMPT,
  PROVIDER_DEFAULTS,
} from './constants'
import { createModuleLogger } from '../utils/logger'
import { errorMessage } from '../utils/errors'
import { isRecord, type JsonRecord } from '../utils/json'

const logger = createModuleLogger('config')

export const SETTINGS_FILENAME = 'settings.json'

export const DEFAULT_APP_SETTINGS: AppSettings = {
  hotkeys: { ...DEFAULT_HOTKEY_BINDINGS },
  llm: {
    provider: 'openrouter',
    openRouter: {
      apiKey: '',
      baseUrl: PROVIDER_DEFAULTS.openRouter.baseUrl,
      model: PROVIDER_DEFAULTS.openRouter.model,
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
      temperature: PROVIDER_DEFAULTS.openRouter.temperature,
      maxTokens: PROVIDER_DEFAULTS.openRouter.maxTokens,
      timeoutMs: PROVIDER_DEFAULTS.timeoutMs,
    },
    ollama: {
      serverUrl: PROVIDER_DEFAULTS.ollama.serverUrl,
      model: PROVIDER_DEFAULTS.ollama.model,
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
      timeoutMs: PROVIDER_DEFAULTS.timeoutMs,
    },
  },
  transcription: {
    apiKey: '',
    baseUrl: PROVIDER_DEFAULTS.transcription.baseUrl,
    modelId: PROVIDER_DEFAULTS.transcription.modelId,
    timeoutMs: 120000,
  },
  recorder: {
    sampleRate: 16000,
    channels: 1,
  },
  notification: {
    enabled: false,
    soundFile: '',
    volume: 0.5,
    playOnSpeechToText: true,
    playOnLlmResponse: true,
  },
  history: {
    enabled: true,
    retainRecordings: false,
    retentionDays: DEFAULT_RETENTION_DAYS,
  },
  tts: {
    enabled: false,
    maxTextLength: DEFAULT_TTS_MAX_TEXT_LENGTH,
  },
  vision: {
    enabled: false,
    systemPrompt: DEFAULT_VISION_PROMPT,
  },
}

export interface ConfigLocation {
  /** 用户配置目录 */
  configDir?: string
  /** 内置配置模板目录 */
  bundledConfigDir?: string
}

function section(raw: JsonRecord, key: string): JsonRecord {
  const value = raw[key]
  return isRecord(value) ? value : {}
}

function str(raw: JsonRecord, key: string, fallback: string): string {
  const value = raw[key]
  return typeof value === 'string' ? value : fallback
}

function optionalStr(raw: JsonRecord, key: string, fallback?: string): string | undefined {
  const value = raw[key]
  return typeof value === 'string' && value.trim() ? value : fallback
}

function num(raw: JsonRecord, key: string, fallback: number): number {
  const value = raw[key]
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback
}

function bool(raw: JsonRecord, key: string, fallback: boolean): boolean {
  const value = raw[key]
  return typeof value === 'boolean' ? value : fallback
}

function positiveInt(raw: JsonRecord, key: string, fallback: number): number {
  const value = Math.floor(num(raw, key, fallback))
  return value > 0 ? value : fallback
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

function provider(raw: JsonRecord, fallback: LlmProviderId): LlmProviderId {
  const value = raw.provider
  if (value === 'openrouter' || value === 'ollama') return value
  if (value !== undefined) {
    logger.warn('未知的 LLM 提供方，使用默认值', { provider: String(value), fallback })
  }
  return fallback
}

/**
 * 将任意 JSON 按节合并到基准设置上，并规范数值范围
 */
export function normalizeAppSettings(input: unknown, base: AppSettings = DEFAULT_APP_SETTINGS): AppSettings {
  const raw = isRecord(input) ? input : {}
  const hotkeys = section(raw, 'hotkeys')
  const llm = section(raw, 'llm')
  const openRouter = section(llm, 'openRouter')
  const ollama = section(llm, 'ollama')
  const transcription = section(raw, 'transcription')
  const recorder = section(raw, 'recorder')
  const notification = section(raw, 'notification')
  const history = section(raw, 'history')
  const tts = section(raw, 'tts')
  const vision = section(raw, 'vision')

  return {
    hotkeys: {
      trigger1: str(hotkeys, 'trigger1', base.hotkeys.trigger1),
      trigger2: str(hotkeys, 'trigger2', base.hotkeys.trigger2),
      trigger3: str(hotkeys, 'trigger3', base.hotkeys.trigger3),
    },
    llm: {
      provider: provider(llm, base.llm.provider),
      openRouter: {
        apiKey: str(openRouter, 'apiKey', base.llm.openRouter.apiKey),
        baseUrl: str(openRouter, 'baseUrl', base.llm.openRouter.baseUrl),
        model: str(openRouter, 'model', base.llm.openRouter.model),
        systemPrompt: str(openRouter, 'systemPrompt', base.llm.openRouter.systemPrompt),
        temperature: clamp(num(openRouter, 'temperature', base.llm.openRouter.temperature), 0, 2),
        maxTokens: positiveInt(openRouter, 'maxTokens', base.llm.openRouter.maxTokens),
        timeoutMs: positiveInt(openRouter, 'timeoutMs', base.llm.openRouter.timeoutMs),
      },
      ollama: {
        serverUrl: str(ollama, 'serverUrl', base.llm.ollama.serverUrl),
        model: str(ollama, 'model', base.llm.ollama.model),
        systemPrompt: str(ollama, 'systemPrompt', base.llm.ollama.systemPrompt),
        timeoutMs: positiveInt(ollama, 'timeoutMs', base.llm.ollama.timeoutMs),
      },
    },
    transcription: {
      apiKey: str(transcription, 'apiKey', base.transcription.apiKey),
      baseUrl: str(transcription, 'baseUrl', base.transcription.baseUrl),
      modelId: str(transcription, 'modelId', base.transcription.modelId),
      language: optionalStr(transcription, 'language', base.transcription.language),
      timeoutMs: positiveInt(transcription, 'timeoutMs', base.transcription.timeoutMs),
    },
    recorder: {
      sampleRate: positiveInt(recorder, 'sampleRate', base.recorder.sampleRate),
      channels: positiveInt(recorder, 'channels', base.recorder.channels),
    },
    notification: {
      enabled: bool(notification, 'enabled', base.notification.enabled),
      soundFile: str(notification, 'soundFile', base.notification.soundFile),
      volume: clamp(num(notification, 'volume', base.notification.volume), 0, 1),
      playOnSpeechToText: bool(notification, 'playOnSpeechToText', base.notification.playOnSpeechToText),
      playOnLlmResponse: bool(notification, 'playOnLlmResponse', base.notification.playOnLlmResponse),
    },
    history: {
      enabled: bool(history, 'enabled', base.history.enabled),
      retainRecordings: bool(history, 'retainRecordings', base.history.retainRecordings),
      retentionDays: Math.max(0, Math.floor(num(history, 'retentionDays', base.history.retentionDays))),
    },
    tts: {
      enabled: bool(tts, 'enabled', base.tts.enabled),
      maxTextLength: positiveInt(tts, 'maxTextLength', base.tts.maxTextLength),
    },
    vision: {
      enabled: bool(vision, 'enabled', base.vision.enabled),
      systemPrompt: str(vision, 'systemPrompt', base.vision.systemPrompt),
    },
  }
}

/**
 * 读取 JSON 配置：优先用户配置目录，其次内置配置目录
 */
export function loadJsonFile(filename: string, location: ConfigLocation = {}): unknown {
  const candidates = [
    path.join(location.configDir ?? getConfigDir(), filename),
    path.join(location.bundledConfigDir ?? getBundledConfigDir(), filename),
  ]

  for (const filePath of candidates) {
    if (!fs.existsSync(filePath)) continue
    try {
      const raw = fs.readFileSync(filePath, 'utf-8')
      const parsed: unknown = JSON.parse(raw)
      return parsed
    } catch (error) {
      logger.warn(`读取 ${filename} 失败，使用默认值`, { filePath, error: errorMessage(error) })
      return undefined
    }
  }

  return undefined
}

export function loadAppSettings(location: ConfigLocation = {}): AppSettings {
  return normalizeAppSettings(loadJsonFile(SETTINGS_FILENAME, location))
}

/**
 * 按节合并补丁
 */
export function mergeAppSettings(current: AppSettings, patch: AppSettingsPatch): AppSettings {
  return normalizeAppSettings(
    {
      hotkeys: { ...current.hotkeys, ...patch.hotkeys },
      llm: {
        ...current.llm,
        ...patch.llm,
        openRouter: { ...current.llm.openRouter, ...patch.llm?.openRouter },
        ollama: { ...current.llm.ollama, ...patch.llm?.ollama },
      },
      transcription: { ...current.transcription, ...patch.transcription },
      recorder: { ...current.recorder, ...patch.recorder },
      notification: { ...current.notification, ...patch.notification },
      history: { ...current.history, ...patch.history },
      tts: { ...current.tts, ...patch.tts },
      vision: { ...current.vision, ...patch.vision },
    },
    current
  )
}

export function saveAppSettings(patch: AppSettingsPatch, location: ConfigLocation = {}): AppSettings {
  const updated = mergeAppSettings(loadAppSettings(location), patch)
  const configDir = location.configDir ?? getConfigDir()

  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true })
  }

  const filePath = path.join(configDir, SETTINGS_FILENAME)
  fs.writeFileSync(filePath, JSON.stringify(updated, null, 2), 'utf-8')
  logger.info('应用设置已保存', { filePath })
  return updated
}

// 导出路径工具函数供其他模块使用
export * from './paths'
