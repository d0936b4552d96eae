/**
 * 解析外部 JSON 时使用的窄化工具
 */

export type JsonRecord = Record<string, unknown>

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function getRecord(value: unknown, key: string): JsonRecord | undefined {
  if (!isRecord(value)) return undefined
  const child = value[key]
  return isRecord(child) ? child : undefined
}

export function getString(value: unknown, key: string): string | undefined {
  if (!isRecord(value)) return undefined
  const child = value[key]
  return typeof child === 'string' ? child : undefined
}

export function getNumber(value: unknown, key: string): number | undefined {
  if (!isRecord(value)) return undefined
  const child = value[key]
  return typeof child === 'number' && Number.isFinite(child) ? child : undefined
}

export function getArray(value: unknown, key: string): unknown[] {
  if (!isRecord(value)) return []
  const child = value[key]
  return Array.isArray(child) ? child : []
}

/**
 * 从 OpenAI 兼容的错误响应体中提取错误信息
 */
export function extractErrorMessage(body: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body)
    return getString(getRecord(parsed, 'error'), 'message') ?? getString(parsed, 'error')
  } catch {
    return undefined
  }
}
