/**
 * OpenAITranscriber Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { OpenAITranscriber, parseSegments } from '../../main/transcriber'
import { DEFAULT_APP_SETTINGS } from '../../main/config'
import { silentLogger } from '../helpers/fakes'

type FetchArgs = [input: string | URL | Request, init?: RequestInit]

describe('parseSegments', () => {
  it('keeps well-formed segments and trims their text', () => {
    expect(parseSegments({
      segments: [
        { id: 0, start: 0, end: 1.5, text: ' Hello ' },
        { id: 1, start: 1.5, text: 'missing end' },
        { id: 2, start: 1.5, end: 2, text: 'world' },
      ],
    })).toEqual([
      { start: 0, end: 1.5, text: 'Hello' },
      { start: 1.5, end: 2, text: 'world' },
    ])
  })

  it('returns an empty list when segments are absent', () => {
    expect(parseSegments({ text: 'hi' })).toEqual([])
    expect(parseSegments(null)).toEqual([])
  })
})

describe('OpenAITranscriber', () => {
  const fetchMock = vi.fn(async (..._args: FetchArgs) => new Response('{}'))
  const config = { ...DEFAULT_APP_SETTINGS.transcription, apiKey: 'test-key', baseUrl: 'https://stt.example/v1' }
  let tempDir: string
  let audioPath: string

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keytalk-stt-'))
    audioPath = path.join(tempDir, 'clip.wav')
    fs.writeFileSync(audioPath, 'RIFF-test-audio')
  })

  afterEach(() => {
    vi.unstubAllGlobals()
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('uploads the recording and maps the verbose response', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({
      text: '  hello world ',
      language: 'english',
      segments: [{ start: 0, end: 1, text: 'hello world' }],
    })))
    const transcriber = new OpenAITranscriber(config, silentLogger())

    const result = await transcriber.transcribe(audioPath)

    expect(result).toMatchObject({
      text: 'hello world',
      language: 'english',
      modelId: 'whisper-1',
      segments: [{ start: 0, end: 1, text: 'hello world' }],
    })

    const [url, init] = fetchMock.mock.calls[0] ?? []
    expect(url).toBe('https://stt.example/v1/audio/transcriptions')
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-key' })

    const body = init?.body
    expect(body).toBeInstanceOf(FormData)
    if (body instanceof FormData) {
      expect(body.get('model')).toBe('whisper-1')
      expect(body.get('response_format')).toBe('verbose_json')
      expect(body.get('language')).toBeNull()
      const file = body.get('file')
      expect(file).toBeInstanceOf(Blob)
      expect(file).toHaveProperty('name', 'clip.wav')
    }
  })

  it('sends the configured language', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ text: 'bonjour' })))
    const transcriber = new OpenAITranscriber({ ...config, language: 'fr' }, silentLogger())

    const result = await transcriber.transcribe(audioPath)

    const body = fetchMock.mock.calls[0]?.[1]?.body
    expect(body instanceof FormData ? body.get('language') : undefined).toBe('fr')
    expect(result.language).toBe('fr')
  })

  it('returns empty text for silent recordings', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ text: '   ' })))
    const transcriber = new OpenAITranscriber(config, silentLogger())

    expect((await transcriber.transcribe(audioPath)).text).toBe('')
  })

  it('rejects without an API key', async () => {
    const transcriber = new OpenAITranscriber({ ...config, apiKey: '' }, silentLogger())

    await expect(transcriber.transcribe(audioPath)).rejects.toThrow('在线转写配置无效')
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('surfaces API errors', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ error: { message: 'Invalid file format' } }), { status: 400 }))
    const transcriber = new OpenAITranscriber(config, silentLogger())

    await expect(transcriber.transcribe(audioPath)).rejects.toThrow('Invalid file format')
  })
})
