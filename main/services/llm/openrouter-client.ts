/**
 * OpenRouter 客户端
 *
 * 使用 OpenAI 兼容的 /chat/completions 接口
 */

import type { OpenRouterConfig } from '../../../shared/app-state'
import type { LlmClient } from '../../core/capabilities'
import { createModuleLogger, type Logger } from '../../utils/logger'
import { extractErrorMessage, getArray, getRecord, getString } from '../../utils/json'

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.trim().replace(/\/+$/, '')
}

export class OpenRouterClient implements LlmClient {
  readonly id = 'openrouter'

  constructor(
    private config: OpenRouterConfig,
    private readonly logger: Logger = createModuleLogger('openrouter-client')
  ) {}

  /**
   * 更新配置
   */
  updateConfig(config: OpenRouterConfig): void {
    this.config = config
    this.logger.info('OpenRouter 配置已更新', { model: config.model })
  }

  async isConfigured(): Promise<boolean> {
    return !!(this.config.apiKey.trim() && this.config.model.trim())
  }

  async complete(userText: string, systemPrompt: string, model: string): Promise<string> {
    const startTime = Date.now()
    const url = `${normalizeBaseUrl(this.config.baseUrl)}/chat/completions`
    const messages = systemPrompt.trim()
      ? [{ role: 'system', content: systemPrompt }, { role: 'user', content: userText }]
      : [{ role: 'user', content: userText }]

    this.logger.info('开始请求', { model, textLength: userText.length })

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.config.apiKey}`,
          'X-Title': 'KeyTalk',
        },
        body: JSON.stringify({
          model,
          messages,
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        }),
        signal: controller.signal,
      })

      if (!response.ok) {
        const errorText = await response.text()
        throw new Error(extractErrorMessage(errorText) ?? `API 请求失败: HTTP ${response.status}`)
      }

      const data: unknown = await response.json()
      const apiError = getString(getRecord(data, 'error'), 'message')
      if (apiError) {
        throw new Error(apiError)
      }

      const content = getString(getRecord(getArray(data, 'choices')[0], 'message'), 'content')
      if (content === undefined) {
        throw new Error('API 未返回有效内容')
      }

      this.logger.info('请求完成', { durationMs: Date.now() - startTime, outputLength: content.length })
      return content
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`OpenRouter 请求超时（${this.config.timeoutMs / 1000}秒）`)
      }
      throw error
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
