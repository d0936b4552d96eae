/**
 * 流程编排依赖的外部能力接口
 *
 * 每个接口只描述边界，具体实现位于 services/、audio/、transcriber/、storage/
 */

import type { AppSettings, NotificationKind } from '../../shared/app-state'
import type { HistoryEntry, TranscriptSegment } from '../../shared/history'

export interface AudioCapture {
  startRecording(filePath: string): Promise<void>
  stopRecording(): Promise<void>
}

export interface TranscriptionResult {
  text: string
  segments: TranscriptSegment[]
  language?: string
  modelId: string
  durationMs: number
}

export interface Transcriber {
  transcribe(filePath: string): Promise<TranscriptionResult>
  destroy?(): void
}

/**
 * 两个 LLM 提供方遵循相同契约
 */
export interface LlmClient {
  readonly id: string
  isConfigured(): Promise<boolean>
  complete(userText: string, systemPrompt: string, model: string): Promise<string>
}

export interface ClipboardSink {
  setText(text: string): Promise<void>
  getText(): Promise<string>
}

export interface NotificationPlayer {
  play(kind: NotificationKind): Promise<void>
}

export interface HistoryLog {
  append(entry: HistoryEntry): Promise<void>
}

export interface SpeechSynthesizer {
  speak(text: string): Promise<void>
}

export interface VisionRequest {
  /** 随截图一起发送给视觉模型的系统提示 */
  systemPrompt: string
  /** 按住触发时用户口述的问题 */
  question?: string
}

/**
 * 截图 + LLM 描述
 * 返回 null 表示用户取消了截图
 */
export interface VisionCapture {
  analyze(request: VisionRequest): Promise<string | null>
}

export type SettingsListener = (settings: AppSettings) => void

export interface SettingsSource {
  current(): AppSettings
  subscribe(listener: SettingsListener): () => void
}

/**
 * 剪贴板等需要在单一上下文执行的操作通过它排队
 */
export interface MainThreadDispatcher {
  invoke<T>(fn: () => Promise<T>): Promise<T>
}
