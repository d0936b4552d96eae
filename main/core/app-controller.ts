/**
 * KeyTalk 应用控制器
 *
 * 组装热键状态机、键盘监听、后台任务池与流程编排器，
 * 并把它们的事件汇总到一条面向展示层的总线上
 */

import type { AppSettings, LlmProviderId } from '../../shared/app-state'
import type { HotkeyBindings, TransmissionState } from '../../shared/hotkeys'
import type {
  AudioCapture,
  ClipboardSink,
  HistoryLog,
  LlmClient,
  NotificationPlayer,
  SettingsSource,
  SpeechSynthesizer,
  Transcriber,
  VisionCapture,
} from './capabilities'
import { HotkeyStateMachine, type HotkeyEvents } from './hotkey-state-machine'
import { HotkeyListener, type KeyEventSource, type ListenerStatus } from './hotkey-listener'
import { PipelineOrchestrator, type PipelineEvents } from './pipeline-orchestrator'
import { BackgroundWorkPool } from './background-pool'
import { EventBus } from './event-bus'
import { UiohookKeyEventSource } from '../services/keyboard-hook-service'
import { OpenRouterClient } from '../services/llm/openrouter-client'
import { OllamaClient } from '../services/llm/ollama-client'
import { ClipboardService } from '../services/clipboard-service'
import { SoundNotificationPlayer } from '../services/notification-player'
import { SystemSpeechSynthesizer } from '../services/speech-service'
import { checkAllDependencies } from '../services/dependency-checker'
import { SoxAudioCapture } from '../audio/audio-recorder'
import { createTranscriber } from '../transcriber'
import { FileHistoryLog } from '../storage/history-log'
import { getHistoryDir } from '../config/paths'
import { createModuleLogger, type Logger } from '../utils/logger'
import { metrics } from '../utils/metrics'
import { toError } from '../utils/errors'

export type AppEvents = HotkeyEvents & PipelineEvents & {
  listenerRestarting: [attempt: number, delayMs: number]
  listenerFatal: [error: Error]
}

export interface RetentionCapable {
  clearByAge(maxAgeDays: number): Promise<{ deletedCount: number }>
}

export interface AppControllerDeps {
  settings: SettingsSource
  keySource?: KeyEventSource
  audio?: AudioCapture
  transcriber?: Transcriber
  clipboard?: ClipboardSink
  notifications?: NotificationPlayer
  history?: HistoryLog & Partial<RetentionCapable>
  llm?: Record<LlmProviderId, LlmClient>
  speech?: SpeechSynthesizer
  vision?: VisionCapture
}

export interface AppControllerOptions {
  /** 启动时检测系统命令依赖 */
  checkDependencies?: boolean
  settleDelayMs?: number
  tempDir?: string
  now?: () => number
  sleep?: (ms: number) => Promise<void>
  logger?: Logger
}

export interface AppStatus {
  listener: ListenerStatus
  transmission: TransmissionState
  pendingJobs: number
}

function sameBindings(a: HotkeyBindings, b: HotkeyBindings): boolean {
  return a.trigger1 === b.trigger1 && a.trigger2 === b.trigger2 && a.trigger3 === b.trigger3
}

export class AppController {
  readonly events: EventBus<AppEvents>

  private readonly machine: HotkeyStateMachine
  private readonly listener: HotkeyListener
  private readonly pool: BackgroundWorkPool
  private readonly orchestrator: PipelineOrchestrator
  private readonly history: HistoryLog & Partial<RetentionCapable>
  private readonly logger: Logger
  private readonly settingsUpdaters: Array<(settings: AppSettings) => void> = []
  private readonly disposers: Array<() => void> = []
  private started = false

  constructor(
    private readonly deps: AppControllerDeps,
    private readonly options: AppControllerOptions = {}
  ) {
    this.logger = options.logger ?? createModuleLogger('app-controller')
    this.events = new EventBus<AppEvents>('app', this.logger)

    const settings = deps.settings.current()
    this.history = deps.history ?? new FileHistoryLog(getHistoryDir())

    this.machine = new HotkeyStateMachine({
      bindings: settings.hotkeys,
      now: options.now,
      logger: this.logger.child({ component: 'hotkeys' }),
    })
    this.listener = new HotkeyListener(deps.keySource ?? new UiohookKeyEventSource(), this.machine, {
      sleep: options.sleep,
      logger: this.logger.child({ component: 'listener' }),
    })
    this.pool = new BackgroundWorkPool(this.logger.child({ component: 'pool' }))
    this.orchestrator = new PipelineOrchestrator(
      {
        audio: deps.audio ?? this.configurable(new SoxAudioCapture(settings.recorder), (audio, next) => audio.updateConfig(next.recorder)),
        transcriber: deps.transcriber ?? this.configurable(createTranscriber(settings.transcription), (transcriber, next) => transcriber.updateConfig(next.transcription)),
        clipboard: deps.clipboard ?? new ClipboardService(),
        notifications: deps.notifications ?? this.defaultNotifications(),
        history: this.history,
        llm: deps.llm ?? {
          openrouter: this.configurable(new OpenRouterClient(settings.llm.openRouter), (client, next) => client.updateConfig(next.llm.openRouter)),
          ollama: this.configurable(new OllamaClient(settings.llm.ollama), (client, next) => client.updateConfig(next.llm.ollama)),
        },
        settings: deps.settings,
        speech: deps.speech ?? new SystemSpeechSynthesizer(),
        vision: deps.vision,
      },
      {
        pool: this.pool,
        settleDelayMs: options.settleDelayMs,
        tempDir: options.tempDir,
        now: options.now,
        sleep: options.sleep,
        logger: this.logger.child({ component: 'pipeline' }),
      }
    )

    this.disposers.push(this.orchestrator.attach(this.machine))
    this.wireEvents()
    this.disposers.push(deps.settings.subscribe(next => this.applySettings(next)))
  }

  getStatus(): AppStatus {
    return {
      listener: this.listener.getStatus(),
      transmission: this.machine.getState(),
      pendingJobs: this.pool.size,
    }
  }

  /**
   * 启动：清理过期历史后开始键盘监听
   */
  async start(): Promise<void> {
    if (this.started) {
      this.logger.info('应用已启动，跳过')
      return
    }
    this.started = true
    const stopTimer = this.logger.startTimer('应用启动')

    if (this.options.checkDependencies !== false) {
      const { allInstalled, dependencies } = await checkAllDependencies()
      if (!allInstalled) {
        this.logger.warn('部分系统依赖缺失，相关功能不可用', {
          missing: dependencies.filter(dep => !dep.installed).map(dep => dep.name),
        })
      }
    }

    await this.applyRetention()

    // 监听循环在停止或致命失败时结束，失败已通过事件上报
    void this.listener.start()
    stopTimer()
  }

  /**
   * 停止键盘监听并等待进行中的流程结束
   */
  async stop(): Promise<void> {
    if (!this.started) return
    this.started = false
    this.listener.stop()
    await this.listener.whenStopped()
    await this.orchestrator.drain()
    this.logger.info('应用已停止', { metrics: metrics.exportReport() })
  }

  async destroy(): Promise<void> {
    await this.stop()
    while (this.disposers.length > 0) {
      this.disposers.pop()?.()
    }
    this.orchestrator.dispose()
    this.events.clear()
  }

  private async applyRetention(): Promise<void> {
    const { retentionDays } = this.deps.settings.current().history
    if (retentionDays <= 0 || !this.history.clearByAge) return

    try {
      const { deletedCount } = await this.history.clearByAge(retentionDays)
      this.logger.info('历史记录保留策略已执行', { retentionDays, deletedCount })
    } catch (error) {
      this.logger.error(toError(error), { context: 'retention' })
    }
  }

  private applySettings(next: AppSettings): void {
    if (!sameBindings(this.machine.getBindings(), next.hotkeys)) {
      this.machine.updateBindings(next.hotkeys)
    }
    for (const update of this.settingsUpdaters) {
      update(next)
    }
  }

  /**
   * 登记默认创建的服务，设置变化时同步其配置
   */
  private configurable<T>(service: T, update: (service: T, settings: AppSettings) => void): T {
    this.settingsUpdaters.push(next => update(service, next))
    return service
  }

  private defaultNotifications(): NotificationPlayer {
    const player = new SoundNotificationPlayer(this.deps.settings)
    this.disposers.push(() => player.destroy())
    return player
  }

  private wireEvents(): void {
    const machineEvents = this.machine.events
    const pipelineEvents = this.orchestrator.events
    const listenerEvents = this.listener.events

    this.disposers.push(
      machineEvents.on('transmissionStarted', (mode, at) => this.events.emit('transmissionStarted', mode, at)),
      machineEvents.on('transmissionEnded', (mode, durationMs) => this.events.emit('transmissionEnded', mode, durationMs)),
      machineEvents.on('transmissionAbandoned', (mode, reason) => this.events.emit('transmissionAbandoned', mode, reason)),
      machineEvents.on('ttsTriggered', at => this.events.emit('ttsTriggered', at)),
      machineEvents.on('visionCaptureStarted', at => this.events.emit('visionCaptureStarted', at)),
      pipelineEvents.on('pipelineCompleted', (result, durationMs) => this.events.emit('pipelineCompleted', result, durationMs)),
      pipelineEvents.on('pipelineError', (message, error) => this.events.emit('pipelineError', message, error)),
      listenerEvents.on('restarting', (attempt, delayMs) => this.events.emit('listenerRestarting', attempt, delayMs)),
      listenerEvents.on('fatal', error => this.events.emit('listenerFatal', error)),
    )
  }
}
