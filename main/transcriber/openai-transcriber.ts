import fs from 'node:fs/promises'
import path from 'node:path'
import type { TranscriptionConfig } from '../../shared/app-state'
import type { TranscriptSegment } from '../../shared/history'
import type { Transcriber, TranscriptionResult } from '../core/capabilities'
import { createModuleLogger, type Logger } from '../utils/logger'
import { extractErrorMessage, getArray, getNumber, getString } from '../utils/json'

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.trim().replace(/\/+$/, '')
}

/**
 * 解析 verbose_json 中的分段
 */
export function parseSegments(data: unknown): TranscriptSegment[] {
  return getArray(data, 'segments').flatMap(segment => {
    const text = getString(segment, 'text')
    const start = getNumber(segment, 'start')
    const end = getNumber(segment, 'end')
    if (text === undefined || start === undefined || end === undefined) return []
    return [{ start, end, text: text.trim() }]
  })
}

export class OpenAITranscriber implements Transcriber {
  constructor(
    private config: TranscriptionConfig,
    private readonly logger: Logger = createModuleLogger('openai-transcriber')
  ) {}

  updateConfig(config: TranscriptionConfig): void {
    this.config = config
  }

  private isConfigValid(): boolean {
    return !!(this.config.apiKey && this.config.modelId)
  }

  async transcribe(filePath: string): Promise<TranscriptionResult> {
    if (!this.isConfigValid()) {
      throw new Error('在线转写配置无效：请检查 API Key 和模型 ID')
    }

    const startTime = Date.now()
    const url = `${normalizeBaseUrl(this.config.baseUrl)}/audio/transcriptions`

    this.logger.info('开始在线转写', { modelId: this.config.modelId })

    const fileBuffer = await fs.readFile(filePath)
    const audio = new Blob([new Uint8Array(fileBuffer)], { type: 'audio/wav' })

    const form = new FormData()
    form.append('file', audio, path.basename(filePath))
    form.append('model', this.config.modelId)
    form.append('response_format', 'verbose_json')
    if (this.config.language) {
      form.append('language', this.config.language)
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: form,
        signal: controller.signal,
      })

      if (!response.ok) {
        const errorText = await response.text()
        throw new Error(extractErrorMessage(errorText) ?? `API 请求失败: HTTP ${response.status}`)
      }

      const data: unknown = await response.json()
      const text = getString(data, 'text')?.trim() ?? ''
      const durationMs = Date.now() - startTime

      // 空文本交给流程编排判定为“未检测到语音”
      this.logger.info('在线转写完成', { durationMs, outputLength: text.length })
      return {
        text,
        segments: parseSegments(data),
        language: getString(data, 'language') ?? this.config.language,
        modelId: this.config.modelId,
        durationMs,
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`在线转写超时（${Math.round(this.config.timeoutMs / 1000)}秒）`)
      }
      throw error
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
