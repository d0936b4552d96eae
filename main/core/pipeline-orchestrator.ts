/**
 * KeyTalk 流程编排器
 *
 * 订阅热键状态机的语义事件，按 录音 → 转写 → LLM 增强 → 剪贴板 → 提示音 → 历史记录 → 清理
 * 的顺序驱动每次传输。除录音启动外的所有阶段都在后台任务池中执行。
 */

import crypto from 'node:crypto'
import fs from 'node:fs/promises'
import path from 'node:path'
import type { AppSettings, LlmProviderId, NotificationKind } from '../../shared/app-state'
import type { HeldMode, TransmissionMode } from '../../shared/hotkeys'
import { isAugmentedMode } from '../../shared/hotkeys'
import type { HistoryEntry, PipelineResult } from '../../shared/history'
import type {
  AudioCapture,
  ClipboardSink,
  HistoryLog,
  LlmClient,
  MainThreadDispatcher,
  NotificationPlayer,
  SettingsSource,
  SpeechSynthesizer,
  Transcriber,
  TranscriptionResult,
  VisionCapture,
} from './capabilities'
import type { HotkeyStateMachine } from './hotkey-state-machine'
import { BackgroundWorkPool, SerialDispatcher } from './background-pool'
import { EventBus } from './event-bus'
import {
  LLM_NOT_CONFIGURED_MESSAGE,
  NO_SPEECH_MESSAGE,
  SETTLE_DELAY_MS,
  VISION_CANCELLED_MESSAGE,
} from '../config/constants'
import { getRecordingsDir } from '../config/paths'
import { createModuleLogger, type Logger } from '../utils/logger'
import { metrics } from '../utils/metrics'
import { KeyTalkError, errorMessage, isErrnoException, toError } from '../utils/errors'

export type PipelineEvents = {
  pipelineCompleted: [result: PipelineResult, durationMs: number]
  pipelineError: [message: string, error?: Error]
}

export interface PipelineDeps {
  audio: AudioCapture
  transcriber: Transcriber
  clipboard: ClipboardSink
  notifications: NotificationPlayer
  history: HistoryLog
  llm: Record<LlmProviderId, LlmClient>
  settings: SettingsSource
  speech?: SpeechSynthesizer
  vision?: VisionCapture
  dispatcher?: MainThreadDispatcher
}

export interface PipelineOptions {
  settleDelayMs?: number
  tempDir?: string
  pool?: BackgroundWorkPool
  now?: () => number
  sleep?: (ms: number) => Promise<void>
  logger?: Logger
}

/**
 * 一次按住型传输的上下文，临时录音文件归它独占
 */
interface CaptureContext {
  id: string
  mode: HeldMode
  startedAt: number
  audioPath: string
  recordingReady: Promise<boolean>
  clipboardSnapshot: Promise<string>
}

export interface Augmentation {
  input: string
  clipboard?: string
  response?: string
  error?: string
  cause?: Error
  model?: string
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

/**
 * 复制提示模式下把语音与剪贴板内容拼成一条输入
 */
export function combinePrompt(speech: string, clipboard: string): string {
  const trimmed = clipboard.trim()
  return trimmed ? `${speech}, ${trimmed}` : speech
}

/**
 * 生成写入历史记录的带注释文本
 */
export function formatHistoryText(mode: TransmissionMode, transcript: string, augmentation: Augmentation | null): string {
  if (!augmentation) return transcript

  const outcome = augmentation.response !== undefined
    ? `LLM RESPONSE: ${augmentation.response}`
    : `LLM ERROR: ${augmentation.error ?? ''}`

  switch (mode) {
    case 'prompt':
      return `INPUT: ${transcript}\n\n${outcome}`
    case 'copyPrompt':
      return `SPEECH: ${transcript}\nCLIPBOARD: ${augmentation.clipboard ?? ''}\nCOMBINED: ${augmentation.input}\n\n${outcome}`
    case 'visionHold':
    case 'visionImmediate': {
      const vision = augmentation.response !== undefined
        ? `VISION: ${augmentation.response}`
        : `VISION ERROR: ${augmentation.error ?? ''}`
      return transcript ? `SPEECH: ${transcript}\n\n${vision}` : vision
    }
    default:
      return transcript
  }
}

export class PipelineOrchestrator {
  readonly events: EventBus<PipelineEvents>

  private settings: AppSettings
  private capture: CaptureContext | null = null
  private readonly detachers: Array<() => void> = []

  private readonly dispatcher: MainThreadDispatcher
  private readonly pool: BackgroundWorkPool
  private readonly settleDelayMs: number
  private readonly tempDir: string
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>
  private readonly logger: Logger

  constructor(private readonly deps: PipelineDeps, options: PipelineOptions = {}) {
    this.logger = options.logger ?? createModuleLogger('pipeline')
    this.dispatcher = deps.dispatcher ?? new SerialDispatcher()
    this.pool = options.pool ?? new BackgroundWorkPool(this.logger)
    this.settleDelayMs = options.settleDelayMs ?? SETTLE_DELAY_MS
    this.tempDir = options.tempDir ?? getRecordingsDir()
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
    this.events = new EventBus<PipelineEvents>('pipeline', this.logger)

    // 缓存设置快照，通过订阅保持最新
    this.settings = deps.settings.current()
    this.detachers.push(deps.settings.subscribe(settings => {
      this.settings = settings
    }))
  }

  /**
   * 订阅状态机事件，返回取消订阅函数
   */
  attach(machine: HotkeyStateMachine): () => void {
    const unsubscribers = [
      machine.events.on('transmissionStarted', (mode, startedAt) => this.handleStarted(mode, startedAt)),
      machine.events.on('transmissionEnded', (mode, durationMs) => this.handleEnded(mode, durationMs)),
      machine.events.on('transmissionAbandoned', (mode, reason) => this.handleAbandoned(mode, reason)),
      machine.events.on('ttsTriggered', () => this.pool.run('tts', () => this.speakClipboard())),
      machine.events.on('visionCaptureStarted', () => this.pool.run('vision', () => this.describeScreen())),
    ]
    const detach = () => unsubscribers.forEach(unsubscribe => unsubscribe())
    this.detachers.push(detach)
    return detach
  }

  /**
   * 是否有正在录音的传输
   */
  isCapturing(): boolean {
    return this.capture !== null
  }

  /**
   * 等待所有后台流程结束
   */
  drain(): Promise<void> {
    return this.pool.drain()
  }

  dispose(): void {
    while (this.detachers.length > 0) {
      this.detachers.pop()?.()
    }
  }

  private handleStarted(mode: HeldMode, startedAt: number): void {
    if (this.capture) {
      this.logger.warn('上一次录音上下文未结束，已覆盖', { previous: this.capture.mode, mode })
    }

    const id = crypto.randomUUID()
    const audioPath = path.join(this.tempDir, `recording-${startedAt}-${id}.wav`)

    // 复制提示模式在录音开始时读取剪贴板，避免用户随后复制的内容混入
    const clipboardSnapshot = mode === 'copyPrompt'
      ? this.dispatcher.invoke(() => this.deps.clipboard.getText()).catch((error: unknown) => {
        this.logger.warn('读取剪贴板失败，按空内容处理', { error: errorMessage(error) })
        return ''
      })
      : Promise.resolve('')

    const recordingReady = this.pool.submit('start-recording', () => this.startRecording(mode, audioPath))

    this.capture = { id, mode, startedAt, audioPath, recordingReady, clipboardSnapshot }
  }

  private handleEnded(mode: HeldMode, durationMs: number): void {
    const capture = this.capture
    if (!capture || capture.mode !== mode) {
      this.logger.warn('收到结束事件但没有匹配的录音上下文', { mode })
      return
    }
    this.capture = null
    this.pool.run(`pipeline:${mode}`, () => this.finishCapture(capture, durationMs))
  }

  private handleAbandoned(mode: HeldMode, reason: Error): void {
    const capture = this.capture
    this.capture = null
    this.events.emit('pipelineError', `Transmission abandoned (${mode}): ${reason.message}`, reason)
    if (!capture) return

    this.pool.run('abandon-recording', async () => {
      if (await capture.recordingReady) {
        try {
          await this.deps.audio.stopRecording()
        } catch (error) {
          this.logger.warn('停止被遗弃的录音失败', { error: errorMessage(error) })
        }
      }
      await this.cleanup(capture.audioPath)
    })
  }

  private async startRecording(mode: HeldMode, audioPath: string): Promise<boolean> {
    try {
      await fs.mkdir(path.dirname(audioPath), { recursive: true })
      await this.deps.audio.startRecording(audioPath)
      this.logger.info('录音已开始', { mode, audioPath })
      return true
    } catch (error) {
      this.fail('Failed to start recording', new KeyTalkError('RECORDING_FAILED', errorMessage(error), { cause: error }))
      return false
    }
  }

  private async finishCapture(capture: CaptureContext, heldMs: number): Promise<void> {
    const pipelineStart = this.now()
    const pipelineTimer = metrics.startTimer('pipeline')
    const settings = this.settings

    try {
      if (!(await capture.recordingReady)) return

      try {
        await this.deps.audio.stopRecording()
      } catch (error) {
        this.fail('Failed to stop recording', new KeyTalkError('RECORDING_FAILED', errorMessage(error), { cause: error }))
        return
      }

      await this.sleep(this.settleDelayMs)

      if (!(await this.fileExists(capture.audioPath))) {
        this.fail('Recording file was not created', new KeyTalkError('ARTIFACT_MISSING', capture.audioPath))
        return
      }

      const transcription = await this.transcribe(capture.audioPath)
      if (!transcription) return

      const transcript = transcription.text.trim()
      if (!transcript) {
        this.fail(NO_SPEECH_MESSAGE, new KeyTalkError('NO_SPEECH', NO_SPEECH_MESSAGE))
        return
      }

      const augmentation = isAugmentedMode(capture.mode)
        ? await this.augment(capture, transcript, settings)
        : null

      const deliveredText = augmentation?.response ?? transcript
      let text = formatHistoryText(capture.mode, transcript, augmentation)

      const clipboardError = await this.deliver(deliveredText)
      if (clipboardError) {
        text += `\n\nCLIPBOARD ERROR: ${clipboardError}`
      } else if (!augmentation) {
        await this.notify('speechToText')
      } else if (augmentation.response !== undefined) {
        await this.notify('llmResponse')
      }

      const entry: HistoryEntry = {
        id: capture.id,
        timestamp: capture.startedAt,
        mode: capture.mode,
        transcript,
        text,
        response: augmentation?.response,
        error: augmentation?.error,
        modelsUsed: [transcription.modelId, augmentation?.model].filter((model): model is string => !!model),
        language: transcription.language,
        segments: transcription.segments,
        durationMs: heldMs,
        audioPath: this.settings.history.retainRecordings ? capture.audioPath : undefined,
      }
      const historyId = await this.persist(entry)

      if (augmentation?.error !== undefined) {
        this.fail(augmentation.error, augmentation.cause ?? new KeyTalkError('LLM_FAILED', augmentation.error))
        return
      }

      const result: PipelineResult = {
        mode: capture.mode,
        transcript,
        deliveredText,
        response: augmentation?.response,
        delivered: clipboardError === null,
        historyId,
      }
      this.logger.info('流程完成', { mode: capture.mode, delivered: result.delivered })
      this.events.emit('pipelineCompleted', result, this.now() - pipelineStart)
    } finally {
      metrics.endTimer(pipelineTimer, 'pipeline', { mode: capture.mode })
      await this.cleanup(capture.audioPath)
    }
  }

  private async transcribe(audioPath: string): Promise<TranscriptionResult | null> {
    const timer = metrics.startTimer('transcription')
    try {
      const result = await this.deps.transcriber.transcribe(audioPath)
      metrics.endTimer(timer, 'transcription')
      return result
    } catch (error) {
      metrics.endTimer(timer, 'transcription', { failed: true })
      this.fail('Transcription failed', new KeyTalkError('TRANSCRIPTION_FAILED', errorMessage(error), { cause: error }))
      return null
    }
  }

  /**
   * LLM 增强：失败不中断流程，错误写入结果，原始文本照常投递与记录
   */
  private async augment(capture: CaptureContext, transcript: string, settings: AppSettings): Promise<Augmentation> {
    const timer = metrics.startTimer('augmentation')
    try {
      if (capture.mode === 'visionHold') {
        return await this.analyzeVision(transcript, settings.vision.systemPrompt)
      }

      const clipboard = capture.mode === 'copyPrompt' ? await capture.clipboardSnapshot : undefined
      const input = clipboard !== undefined ? combinePrompt(transcript, clipboard) : transcript
      return await this.complete(input, clipboard, settings)
    } finally {
      metrics.endTimer(timer, 'augmentation', { mode: capture.mode })
    }
  }

  private async complete(input: string, clipboard: string | undefined, settings: AppSettings): Promise<Augmentation> {
    const providerId = settings.llm.provider
    const client = this.deps.llm[providerId]
    const { model, systemPrompt } = providerId === 'openrouter' ? settings.llm.openRouter : settings.llm.ollama
    const base = { input, clipboard, model: `${client.id}:${model}` }

    try {
      if (!(await client.isConfigured())) {
        const message = `${LLM_NOT_CONFIGURED_MESSAGE}: ${providerId}`
        return { ...base, error: message, cause: new KeyTalkError('LLM_NOT_CONFIGURED', message) }
      }

      const response = (await client.complete(input, systemPrompt, model)).trim()
      if (!response) {
        const message = 'LLM returned an empty response'
        return { ...base, error: message, cause: new KeyTalkError('LLM_FAILED', message) }
      }
      this.logger.info('LLM 增强完成', { provider: providerId, model, outputLength: response.length })
      return { ...base, response }
    } catch (error) {
      const cause = toError(error)
      this.logger.error(cause, { context: 'augment', provider: providerId })
      return { ...base, error: cause.message, cause }
    }
  }

  private async analyzeVision(prompt: string, systemPrompt: string): Promise<Augmentation> {
    const vision = this.deps.vision
    if (!vision) {
      const message = 'Vision capture is not available'
      return { input: prompt, error: message, cause: new KeyTalkError('VISION_FAILED', message) }
    }

    try {
      const description = await vision.analyze({ systemPrompt, question: prompt })
      if (description === null) {
        return { input: prompt, error: VISION_CANCELLED_MESSAGE, cause: new KeyTalkError('VISION_FAILED', VISION_CANCELLED_MESSAGE) }
      }
      const trimmed = description.trim()
      if (!trimmed) {
        const message = 'Vision analysis returned no description'
        return { input: prompt, error: message, cause: new KeyTalkError('VISION_FAILED', message) }
      }
      return { input: prompt, response: trimmed, model: 'vision' }
    } catch (error) {
      const cause = toError(error)
      this.logger.error(cause, { context: 'vision' })
      return { input: prompt, error: cause.message, cause }
    }
  }

  /**
   * 写入剪贴板，返回错误信息；成功返回 null
   */
  private async deliver(text: string): Promise<string | null> {
    const timer = metrics.startTimer('delivery')
    try {
      await this.dispatcher.invoke(() => this.deps.clipboard.setText(text))
      metrics.endTimer(timer, 'delivery')
      return null
    } catch (error) {
      metrics.endTimer(timer, 'delivery', { failed: true })
      const err = new KeyTalkError('CLIPBOARD_FAILED', errorMessage(error), { cause: error })
      this.logger.error(err, { context: 'deliver' })
      return err.message
    }
  }

  private async notify(kind: NotificationKind): Promise<void> {
    const { notification } = this.settings
    const wanted = kind === 'llmResponse' ? notification.playOnLlmResponse : notification.playOnSpeechToText
    if (!notification.enabled || !wanted || !notification.soundFile) return

    try {
      await this.deps.notifications.play(kind)
    } catch (error) {
      this.logger.warn('播放提示音失败', { kind, error: errorMessage(error) })
    }
  }

  /**
   * 写入历史记录，返回记录 ID；未启用或失败时返回 undefined
   */
  private async persist(entry: HistoryEntry): Promise<string | undefined> {
    if (!this.settings.history.enabled) return undefined
    try {
      await this.deps.history.append(entry)
      return entry.id
    } catch (error) {
      this.logger.error(toError(error), { context: 'persist', entryId: entry.id })
      return undefined
    }
  }

  private async cleanup(audioPath: string): Promise<void> {
    if (this.settings.history.retainRecordings) {
      this.logger.debug('保留录音文件', { audioPath })
      return
    }
    try {
      await fs.rm(audioPath, { force: true })
    } catch (error) {
      this.logger.warn('删除临时录音失败', { audioPath, error: errorMessage(error) })
    }
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath)
      return stat.isFile()
    } catch (error) {
      if (!isErrnoException(error, 'ENOENT')) {
        this.logger.warn('检查录音文件失败', { filePath, error: errorMessage(error) })
      }
      return false
    }
  }

  /**
   * 朗读剪贴板内容
   */
  private async speakClipboard(): Promise<void> {
    const { tts } = this.settings
    const speech = this.deps.speech
    if (!tts.enabled || !speech) {
      this.logger.info('朗读未启用，忽略触发', { enabled: tts.enabled, available: !!speech })
      return
    }

    const started = this.now()
    let text: string
    try {
      text = (await this.dispatcher.invoke(() => this.deps.clipboard.getText())).trim()
    } catch (error) {
      this.fail('Failed to read clipboard', new KeyTalkError('CLIPBOARD_FAILED', errorMessage(error), { cause: error }))
      return
    }

    if (!text) {
      this.logger.info('剪贴板为空，跳过朗读')
      return
    }

    const spoken = text.length > tts.maxTextLength ? text.slice(0, tts.maxTextLength) : text
    if (spoken.length < text.length) {
      this.logger.info('朗读文本已截断', { original: text.length, limit: tts.maxTextLength })
    }

    try {
      await speech.speak(spoken)
    } catch (error) {
      this.fail('Text-to-speech failed', new KeyTalkError('TTS_FAILED', errorMessage(error), { cause: error }))
      return
    }

    this.events.emit('pipelineCompleted', {
      mode: 'ttsImmediate',
      transcript: '',
      deliveredText: spoken,
      delivered: true,
    }, this.now() - started)
  }

  /**
   * 单击截图描述：结果写入剪贴板
   */
  private async describeScreen(): Promise<void> {
    const vision = this.deps.vision
    if (!this.settings.vision.enabled || !vision) {
      this.logger.info('截图描述未启用，忽略触发', { enabled: this.settings.vision.enabled, available: !!vision })
      return
    }

    const started = this.now()
    let description: string | null
    try {
      description = await vision.analyze({ systemPrompt: this.settings.vision.systemPrompt })
    } catch (error) {
      this.fail('Vision analysis failed', new KeyTalkError('VISION_FAILED', errorMessage(error), { cause: error }))
      return
    }

    if (description === null) {
      this.logger.info('截图已取消')
      return
    }
    const response = description.trim()
    if (!response) {
      this.fail('Vision analysis returned no description', new KeyTalkError('VISION_FAILED', 'empty description'))
      return
    }

    const augmentation: Augmentation = { input: '', response, model: 'vision' }
    let text = formatHistoryText('visionImmediate', '', augmentation)
    const clipboardError = await this.deliver(response)
    if (clipboardError) {
      text += `\n\nCLIPBOARD ERROR: ${clipboardError}`
    } else {
      await this.notify('llmResponse')
    }

    const historyId = await this.persist({
      id: crypto.randomUUID(),
      timestamp: started,
      mode: 'visionImmediate',
      transcript: '',
      text,
      response,
      modelsUsed: ['vision'],
      segments: [],
      durationMs: 0,
    })

    this.events.emit('pipelineCompleted', {
      mode: 'visionImmediate',
      transcript: '',
      deliveredText: response,
      response,
      delivered: clipboardError === null,
      historyId,
    }, this.now() - started)
  }

  private fail(message: string, error?: Error): void {
    this.logger.error(error ?? message, { context: 'pipeline', message })
    this.events.emit('pipelineError', message, error)
  }
}
