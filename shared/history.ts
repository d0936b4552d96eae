import type { TransmissionMode } from './hotkeys'

export interface TranscriptSegment {
  start: number
  end: number
  text: string
}

/**
 * 一次传输的持久化记录，写入后不再修改
 */
export interface HistoryEntry {
  id: string
  timestamp: number
  mode: TransmissionMode
  /** 识别出的原始文本 */
  transcript: string
  /** 带注释的完整记录文本（含 LLM 回复或错误） */
  text: string
  response?: string
  error?: string
  modelsUsed: string[]
  language?: string
  segments: TranscriptSegment[]
  durationMs: number
  audioPath?: string
}

export interface HistoryStats {
  count: number
  sizeBytes: number
  oldestTimestamp?: number
  newestTimestamp?: number
}

/**
 * 流程成功结束后交给展示层的结果
 */
export interface PipelineResult {
  mode: TransmissionMode
  transcript: string
  /** 实际写入剪贴板的文本 */
  deliveredText: string
  response?: string
  delivered: boolean
  historyId?: string
}
