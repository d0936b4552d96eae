/**
 * FileHistoryLog Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import crypto from 'node:crypto'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { FileHistoryLog, parseHistoryEntry } from '../../main/storage/history-log'
import type { HistoryEntry } from '../../shared/history'
import { silentLogger } from '../helpers/fakes'

const DAY_MS = 24 * 60 * 60 * 1000
const NOW = Date.UTC(2026, 0, 31)

function makeEntry(overrides: Partial<HistoryEntry> = {}): HistoryEntry {
  return {
    id: crypto.randomUUID(),
    timestamp: NOW,
    mode: 'plain',
    transcript: 'hello world',
    text: 'hello world',
    modelsUsed: ['whisper-1'],
    segments: [],
    durationMs: 1200,
    ...overrides,
  }
}

describe('parseHistoryEntry', () => {
  it('accepts a stored entry', () => {
    const entry = makeEntry({ response: 'hi', segments: [{ start: 0, end: 1, text: 'hello' }] })
    expect(parseHistoryEntry(JSON.parse(JSON.stringify(entry)))).toEqual(entry)
  })

  it('rejects entries with an unknown mode or missing fields', () => {
    expect(parseHistoryEntry({ ...makeEntry(), mode: 'shout' })).toBeNull()
    expect(parseHistoryEntry({ id: 'x', timestamp: 1 })).toBeNull()
    expect(parseHistoryEntry('not an object')).toBeNull()
  })
})

describe('FileHistoryLog', () => {
  let baseDir: string
  let log: FileHistoryLog

  beforeEach(() => {
    baseDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'keytalk-history-')), 'history')
    log = new FileHistoryLog(baseDir, silentLogger(), () => NOW)
  })

  afterEach(() => {
    fs.rmSync(path.dirname(baseDir), { recursive: true, force: true })
  })

  it('creates the directory and writes one file per entry', async () => {
    const entry = makeEntry()
    await log.append(entry)

    expect(fs.readdirSync(baseDir)).toEqual([`${entry.id}.json`])
    expect(await log.get(entry.id)).toEqual(entry)
  })

  it('refuses to overwrite an existing entry', async () => {
    const entry = makeEntry()
    await log.append(entry)

    await expect(log.append({ ...entry, text: 'changed' })).rejects.toThrow()
    expect((await log.get(entry.id))?.text).toBe('hello world')
  })

  it('rejects ids that are not UUIDs', async () => {
    await expect(log.append(makeEntry({ id: '../escape' }))).rejects.toThrow('记录ID无效')
    expect(await log.get('../escape')).toBeNull()
    expect(await log.delete('../escape')).toBe(false)
  })

  it('lists newest first with paging and mode filter', async () => {
    const oldest = makeEntry({ timestamp: NOW - 3000 })
    const middle = makeEntry({ timestamp: NOW - 2000, mode: 'prompt' })
    const newest = makeEntry({ timestamp: NOW - 1000 })
    for (const entry of [middle, oldest, newest]) {
      await log.append(entry)
    }

    expect((await log.list()).map(entry => entry.id)).toEqual([newest.id, middle.id, oldest.id])
    expect((await log.list({ limit: 1, offset: 1 })).map(entry => entry.id)).toEqual([middle.id])
    expect((await log.list({ mode: 'prompt' })).map(entry => entry.id)).toEqual([middle.id])
  })

  it('returns an empty list before anything is written', async () => {
    expect(await log.list()).toEqual([])
    expect(await log.getStats()).toEqual({ count: 0, sizeBytes: 0, oldestTimestamp: undefined, newestTimestamp: undefined })
  })

  it('searches transcripts, text and responses case-insensitively', async () => {
    const spoken = makeEntry({ transcript: 'Deploy the Service', text: 'Deploy the Service' })
    const answered = makeEntry({ transcript: 'question', text: 'INPUT: question', response: 'The SERVICE is up', timestamp: NOW - 10 })
    await log.append(spoken)
    await log.append(answered)
    await log.append(makeEntry({ transcript: 'unrelated', text: 'unrelated' }))

    expect((await log.search('service')).map(entry => entry.id)).toEqual([spoken.id, answered.id])
    expect(await log.search('   ')).toEqual([])
  })

  it('deletes a single entry', async () => {
    const entry = makeEntry()
    await log.append(entry)

    expect(await log.delete(entry.id)).toBe(true)
    expect(await log.delete(entry.id)).toBe(false)
    expect(await log.get(entry.id)).toBeNull()
  })

  it('deletes the retained recording with its entry', async () => {
    const audioPath = path.join(path.dirname(baseDir), 'kept.wav')
    fs.writeFileSync(audioPath, 'RIFF-test-audio')
    const entry = makeEntry({ audioPath })
    await log.append(entry)

    expect(await log.delete(entry.id)).toBe(true)
    expect(fs.existsSync(audioPath)).toBe(false)
  })

  it('skips corrupt files when listing', async () => {
    const entry = makeEntry()
    await log.append(entry)
    fs.writeFileSync(path.join(baseDir, `${crypto.randomUUID()}.json`), '{ not json')
    fs.writeFileSync(path.join(baseDir, 'notes.txt'), 'ignored')

    expect((await log.list()).map(item => item.id)).toEqual([entry.id])
    expect((await log.getStats()).count).toBe(1)
  })

  it('reports stats over valid entries', async () => {
    await log.append(makeEntry({ timestamp: NOW - 5000 }))
    await log.append(makeEntry({ timestamp: NOW - 100 }))

    const stats = await log.getStats()
    expect(stats.count).toBe(2)
    expect(stats.sizeBytes).toBeGreaterThan(0)
    expect(stats.oldestTimestamp).toBe(NOW - 5000)
    expect(stats.newestTimestamp).toBe(NOW - 100)
  })

  describe('clearByAge', () => {
    it('removes entries older than the cutoff and corrupt files', async () => {
      const fresh = makeEntry({ timestamp: NOW - 2 * DAY_MS })
      const stale = makeEntry({ timestamp: NOW - 40 * DAY_MS })
      await log.append(fresh)
      await log.append(stale)
      fs.writeFileSync(path.join(baseDir, `${crypto.randomUUID()}.json`), '{ not json')

      expect(await log.clearByAge(30)).toEqual({ deletedCount: 2 })
      expect((await log.list()).map(entry => entry.id)).toEqual([fresh.id])
    })

    it('clears everything for zero days except the excluded entry', async () => {
      const keep = makeEntry()
      await log.append(keep)
      await log.append(makeEntry())

      expect(await log.clearByAge(0, keep.id)).toEqual({ deletedCount: 1 })
      expect((await log.list()).map(entry => entry.id)).toEqual([keep.id])
    })

    it('removes retained recordings together with their entries', async () => {
      const recordingsDir = path.join(path.dirname(baseDir), 'recordings')
      fs.mkdirSync(recordingsDir)
      const staleAudio = path.join(recordingsDir, 'stale.wav')
      const freshAudio = path.join(recordingsDir, 'fresh.wav')
      fs.writeFileSync(staleAudio, 'RIFF-test-audio')
      fs.writeFileSync(freshAudio, 'RIFF-test-audio')
      await log.append(makeEntry({ timestamp: NOW - 40 * DAY_MS, audioPath: staleAudio }))
      await log.append(makeEntry({ timestamp: NOW - DAY_MS, audioPath: freshAudio }))

      expect(await log.clearByAge(30)).toEqual({ deletedCount: 1 })
      expect(fs.existsSync(staleAudio)).toBe(false)
      expect(fs.existsSync(freshAudio)).toBe(true)
    })

    it('handles a missing directory', async () => {
      expect(await log.clearByAge(30)).toEqual({ deletedCount: 0 })
    })
  })
})
