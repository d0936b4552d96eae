import { spawn, type ChildProcess } from 'node:child_process'
import type { RecorderConfig } from '../../shared/app-state'
import type { AudioCapture } from '../core/capabilities'
import { createModuleLogger, type Logger } from '../utils/logger'
import { metrics } from '../utils/metrics'

export interface RecordingResult {
  audioPath: string
  durationMs: number
  startedAt: number
}

/**
 * 单次 SoX 录音进程
 */
class SoxRecordingHandle {
  private readonly exited: Promise<number | null>
  private readonly timerId = metrics.startTimer('recording')

  constructor(
    private readonly child: ChildProcess,
    readonly audioPath: string,
    readonly startedAt: number
  ) {
    this.exited = new Promise(resolve => {
      child.once('close', code => resolve(code))
    })
  }

  /**
   * 发送 SIGINT 让 SoX 补全 WAV 头后退出
   */
  async stop(timeoutMs: number): Promise<RecordingResult> {
    if (this.child.exitCode === null) {
      this.child.kill('SIGINT')
    }

    const timer = setTimeout(() => this.child.kill('SIGKILL'), timeoutMs)
    try {
      await this.exited
    } finally {
      clearTimeout(timer)
      metrics.endTimer(this.timerId, 'recording')
    }

    return {
      audioPath: this.audioPath,
      durationMs: Date.now() - this.startedAt,
      startedAt: this.startedAt,
    }
  }
}

/**
 * 使用 SoX 从默认输入设备录制 16-bit PCM WAV
 */
export class SoxAudioCapture implements AudioCapture {
  private active: SoxRecordingHandle | null = null
  // spawn 事件之前的进程，避免重叠启动
  private pending: ChildProcess | null = null

  constructor(
    private config: RecorderConfig,
    private readonly command = 'sox',
    private readonly logger: Logger = createModuleLogger('audio-recorder')
  ) {}

  updateConfig(config: RecorderConfig): void {
    this.config = config
  }

  isRecording(): boolean {
    return this.active !== null
  }

  buildArgs(filePath: string): string[] {
    return [
      '-q',
      '-d',
      '-r', String(this.config.sampleRate),
      '-c', String(this.config.channels),
      '-b', '16',
      '-e', 'signed-integer',
      filePath,
    ]
  }

  startRecording(filePath: string): Promise<void> {
    if (this.active || this.pending) {
      return Promise.reject(new Error('已有录音在进行中'))
    }

    return new Promise((resolve, reject) => {
      const child = spawn(this.command, this.buildArgs(filePath), { stdio: ['ignore', 'ignore', 'pipe'] })
      this.pending = child

      child.stderr?.on('data', (chunk: Buffer) => {
        this.logger.debug('sox 输出', { message: chunk.toString().trim() })
      })
      child.once('error', error => {
        if (this.pending === child) this.pending = null
        reject(error)
      })
      child.once('spawn', () => {
        this.pending = null
        const handle = new SoxRecordingHandle(child, filePath, Date.now())
        this.active = handle
        child.once('close', code => {
          if (this.active !== handle) return
          this.active = null
          this.logger.warn('录音进程意外退出', { filePath, code })
        })
        this.logger.info('录音进程已启动', { filePath, pid: child.pid })
        resolve()
      })
    })
  }

  async stopRecording(): Promise<void> {
    const handle = this.active
    if (!handle) {
      throw new Error('当前没有进行中的录音')
    }
    this.active = null

    const result = await handle.stop(3000)
    this.logger.info('录音已停止', { audioPath: result.audioPath, durationMs: result.durationMs })
  }
}
