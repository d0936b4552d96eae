/**
 * Ollama 本地模型客户端
 */

import type { OllamaConfig } from '../../../shared/app-state'
import type { LlmClient } from '../../core/capabilities'
import { createModuleLogger, type Logger } from '../../utils/logger'
import { errorMessage } from '../../utils/errors'
import { getArray, getRecord, getString } from '../../utils/json'

function normalizeServerUrl(serverUrl: string): string {
  return serverUrl.trim().replace(/\/+$/, '')
}

export class OllamaClient implements LlmClient {
  readonly id = 'ollama'

  constructor(
    private config: OllamaConfig,
    private readonly logger: Logger = createModuleLogger('ollama-client')
  ) {}

  updateConfig(config: OllamaConfig): void {
    this.config = config
    this.logger.info('Ollama 配置已更新', { serverUrl: config.serverUrl, model: config.model })
  }

  /**
   * 只检查地址与模型是否已填写，不探测服务是否在线
   */
  async isConfigured(): Promise<boolean> {
    return !!(this.config.serverUrl.trim() && this.config.model.trim())
  }

  /**
   * 列出服务端已安装的模型
   */
  async listModels(): Promise<string[]> {
    const response = await this.request('/api/tags', { method: 'GET' })
    const data: unknown = await response.json()
    return getArray(data, 'models')
      .map(model => getString(model, 'name'))
      .filter((name): name is string => !!name)
  }

  async complete(userText: string, systemPrompt: string, model: string): Promise<string> {
    const startTime = Date.now()
    const messages = systemPrompt.trim()
      ? [{ role: 'system', content: systemPrompt }, { role: 'user', content: userText }]
      : [{ role: 'user', content: userText }]

    this.logger.info('开始请求', { model, textLength: userText.length })

    const response = await this.request('/api/chat', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model, messages, stream: false }),
    })

    const data: unknown = await response.json()
    const apiError = getString(data, 'error')
    if (apiError) {
      throw new Error(apiError)
    }

    const content = getString(getRecord(data, 'message'), 'content')
    if (content === undefined) {
      throw new Error('Ollama 未返回有效内容')
    }

    this.logger.info('请求完成', { durationMs: Date.now() - startTime, outputLength: content.length })
    return content
  }

  private async request(pathname: string, init: RequestInit): Promise<Response> {
    const url = `${normalizeServerUrl(this.config.serverUrl)}${pathname}`
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs)

    try {
      const response = await fetch(url, { ...init, signal: controller.signal })
      if (!response.ok) {
        const errorText = await response.text()
        throw new Error(`Ollama 请求失败: HTTP ${response.status}${errorText ? ` ${errorText}` : ''}`)
      }
      return response
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Ollama 请求超时（${this.config.timeoutMs / 1000}秒）`)
      }
      this.logger.warn('Ollama 请求出错', { url, error: errorMessage(error) })
      throw error
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
