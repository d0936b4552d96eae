import fs from 'node:fs/promises'
import path from 'node:path'
import type { TransmissionMode } from '../../shared/hotkeys'
import type { HistoryEntry, HistoryStats, TranscriptSegment } from '../../shared/history'
import type { HistoryLog } from '../core/capabilities'
import { createModuleLogger, type Logger } from '../utils/logger'
import { errorMessage, isErrnoException, toError } from '../utils/errors'
import { getArray, getNumber, getString, isRecord } from '../utils/json'

/** UUID 格式正则表达式 */
const UUID_PATTERN = /^[a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12}$/i

const DAY_MS = 24 * 60 * 60 * 1000

const MODES: readonly TransmissionMode[] = ['plain', 'prompt', 'copyPrompt', 'visionHold', 'visionImmediate', 'ttsImmediate']

/**
 * 判断是否为预期的文件读取错误（文件不存在或JSON解析失败）
 */
function isExpectedReadError(error: unknown): boolean {
  return error instanceof SyntaxError || isErrnoException(error, 'ENOENT')
}

function parseMode(value: unknown): TransmissionMode | undefined {
  return MODES.find(mode => mode === value)
}

function parseSegments(value: unknown): TranscriptSegment[] {
  return (Array.isArray(value) ? value : []).flatMap((segment: unknown) => {
    const start = getNumber(segment, 'start')
    const end = getNumber(segment, 'end')
    const text = getString(segment, 'text')
    return start !== undefined && end !== undefined && text !== undefined ? [{ start, end, text }] : []
  })
}

/**
 * 校验磁盘上的记录，结构不符返回 null
 */
export function parseHistoryEntry(value: unknown): HistoryEntry | null {
  if (!isRecord(value)) return null

  const id = getString(value, 'id')
  const timestamp = getNumber(value, 'timestamp')
  const mode = parseMode(value.mode)
  const transcript = getString(value, 'transcript')
  const text = getString(value, 'text')
  if (!id || timestamp === undefined || !mode || transcript === undefined || text === undefined) {
    return null
  }

  return {
    id,
    timestamp,
    mode,
    transcript,
    text,
    response: getString(value, 'response'),
    error: getString(value, 'error'),
    modelsUsed: getArray(value, 'modelsUsed').filter((model): model is string => typeof model === 'string'),
    language: getString(value, 'language'),
    segments: parseSegments(value.segments),
    durationMs: getNumber(value, 'durationMs') ?? 0,
    audioPath: getString(value, 'audioPath'),
  }
}

export interface ListOptions {
  limit?: number
  offset?: number
  mode?: TransmissionMode
}

/**
 * 历史记录：每条记录一个 <id>.json 文件
 */
export class FileHistoryLog implements HistoryLog {
  constructor(
    private readonly baseDir: string,
    private readonly logger: Logger = createModuleLogger('history-log'),
    private readonly now: () => number = Date.now
  ) {}

  async append(entry: HistoryEntry): Promise<void> {
    // 验证记录 ID 格式，防止路径遍历
    if (!UUID_PATTERN.test(entry.id)) {
      throw new Error(`记录ID无效：${entry.id}`)
    }

    await fs.mkdir(this.baseDir, { recursive: true })
    const filePath = this.entryPath(entry.id)
    // 写入后不再修改，已存在则拒绝覆盖
    await fs.writeFile(filePath, JSON.stringify(entry, null, 2), { encoding: 'utf-8', flag: 'wx' })
    this.logger.debug('历史记录已写入', { entryId: entry.id, mode: entry.mode })
  }

  /**
   * 获取历史记录列表
   * @returns 按时间倒序排列的记录
   */
  async list(options: ListOptions = {}): Promise<HistoryEntry[]> {
    const { limit = 50, offset = 0, mode } = options
    const entries = await this.readAll()
    return entries
      .filter(entry => !mode || entry.mode === mode)
      .slice(offset, offset + limit)
  }

  async get(id: string): Promise<HistoryEntry | null> {
    if (!UUID_PATTERN.test(id)) {
      return null
    }
    return this.readEntry(this.entryPath(id))
  }

  /**
   * 删除单条记录及其保留的录音
   */
  async delete(id: string): Promise<boolean> {
    if (!UUID_PATTERN.test(id)) {
      this.logger.warn('删除失败：无效的记录 ID 格式', { entryId: id })
      return false
    }

    const entry = await this.readEntry(this.entryPath(id))
    try {
      await fs.unlink(this.entryPath(id))
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) {
        return false
      }
      throw error
    }
    await this.removeRecording(entry)
    this.logger.info('历史记录已删除', { entryId: id })
    return true
  }

  /**
   * 按关键字搜索（不区分大小写），匹配识别文本、记录文本与 LLM 回复
   */
  async search(query: string, limit = 50): Promise<HistoryEntry[]> {
    const needle = query.trim().toLowerCase()
    if (!needle) return []

    const entries = await this.readAll()
    return entries
      .filter(entry => [entry.transcript, entry.text, entry.response ?? '']
        .some(field => field.toLowerCase().includes(needle)))
      .slice(0, limit)
  }

  async getStats(): Promise<HistoryStats> {
    let sizeBytes = 0
    let count = 0
    let oldestTimestamp: number | undefined
    let newestTimestamp: number | undefined

    for (const fileName of await this.entryFiles()) {
      const filePath = path.join(this.baseDir, fileName)
      const entry = await this.readEntry(filePath)
      if (!entry) continue

      count++
      sizeBytes += (await fs.stat(filePath)).size
      oldestTimestamp = oldestTimestamp === undefined ? entry.timestamp : Math.min(oldestTimestamp, entry.timestamp)
      newestTimestamp = newestTimestamp === undefined ? entry.timestamp : Math.max(newestTimestamp, entry.timestamp)
    }

    return { count, sizeBytes, oldestTimestamp, newestTimestamp }
  }

  /**
   * 按时间范围清除历史记录
   * @param maxAgeDays 清除多少天前的记录，0 表示清除全部
   * @param excludeId 要保留的记录
   * @returns 删除的记录数量
   */
  async clearByAge(maxAgeDays: number, excludeId?: string): Promise<{ deletedCount: number }> {
    let deletedCount = 0
    const cutoff = this.now() - maxAgeDays * DAY_MS

    for (const fileName of await this.entryFiles()) {
      if (excludeId && fileName === `${excludeId}.json`) continue

      const filePath = path.join(this.baseDir, fileName)
      let entry: HistoryEntry | null = null
      let readFailed = false
      try {
        entry = parseHistoryEntry(JSON.parse(await fs.readFile(filePath, 'utf-8')))
      } catch (error) {
        if (!isExpectedReadError(error)) {
          readFailed = true
          this.logger.error(toError(error), { context: 'clearByAge', fileName })
        }
      }

      // 结构损坏的记录同样清除；非预期错误（权限、IO等）跳过，避免误删
      const shouldDelete = maxAgeDays === 0 || (!readFailed && (!entry || entry.timestamp < cutoff))
      if (!shouldDelete) continue

      await fs.rm(filePath, { force: true })
      await this.removeRecording(entry)
      deletedCount++
    }

    if (deletedCount > 0) {
      this.logger.info('历史记录已清理', { deletedCount, maxAgeDays })
    }
    return { deletedCount }
  }

  private async removeRecording(entry: HistoryEntry | null): Promise<void> {
    if (!entry?.audioPath) return
    try {
      await fs.rm(entry.audioPath, { force: true })
    } catch (error) {
      this.logger.warn('删除保留的录音失败', { entryId: entry.id, audioPath: entry.audioPath, error: errorMessage(error) })
    }
  }

  private entryPath(id: string): string {
    return path.join(this.baseDir, `${id}.json`)
  }

  private async entryFiles(): Promise<string[]> {
    try {
      const names = await fs.readdir(this.baseDir)
      return names.filter(name => name.endsWith('.json') && UUID_PATTERN.test(name.slice(0, -'.json'.length)))
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) return []
      throw error
    }
  }

  private async readEntry(filePath: string): Promise<HistoryEntry | null> {
    try {
      const entry = parseHistoryEntry(JSON.parse(await fs.readFile(filePath, 'utf-8')))
      if (!entry) {
        this.logger.warn('历史记录结构无效，已跳过', { filePath })
      }
      return entry
    } catch (error) {
      if (isExpectedReadError(error)) return null
      throw error
    }
  }

  private async readAll(): Promise<HistoryEntry[]> {
    const entries: HistoryEntry[] = []
    for (const fileName of await this.entryFiles()) {
      try {
        const entry = await this.readEntry(path.join(this.baseDir, fileName))
        if (entry) entries.push(entry)
      } catch (error) {
        this.logger.warn('读取历史记录失败', { fileName, error: errorMessage(error) })
      }
    }
    // 最新的在前
    return entries.sort((a, b) => b.timestamp - a.timestamp)
  }
}
