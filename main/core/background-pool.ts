/**
 * 后台任务池与串行调度器
 *
 * 流程阶段在 setImmediate 之后执行，按键事件回调永远不会等待 I/O。
 * 剪贴板这类需要单一执行上下文的操作统一交给 SerialDispatcher 排队。
 */

import type { MainThreadDispatcher } from './capabilities'
import { createModuleLogger, type Logger } from '../utils/logger'
import { toError } from '../utils/errors'

export class BackgroundWorkPool {
  private readonly inFlight = new Map<number, { label: string; promise: Promise<unknown> }>()
  private nextId = 1

  constructor(private readonly logger: Logger = createModuleLogger('background-pool')) {}

  /**
   * 提交任务，返回任务结果。失败会被记录，同时继续向调用方传递
   */
  submit<T>(label: string, task: () => Promise<T>): Promise<T> {
    const id = this.nextId++
    const promise = new Promise<T>((resolve, reject) => {
      setImmediate(() => {
        task().then(resolve, reject)
      })
    })

    const tracked = promise.then(
      () => undefined,
      (error: unknown) => {
        this.logger.error(toError(error), { context: 'background-task', label })
      }
    ).finally(() => {
      this.inFlight.delete(id)
    })

    this.inFlight.set(id, { label, promise: tracked })
    return promise
  }

  /**
   * 提交任务且不关心结果，失败只记录日志
   */
  run(label: string, task: () => Promise<void>): void {
    // 拒绝已由跟踪链处理并记录
    void this.submit(label, task)
  }

  get size(): number {
    return this.inFlight.size
  }

  pendingLabels(): string[] {
    return [...this.inFlight.values()].map(job => job.label)
  }

  /**
   * 等待所有进行中的任务结束，包括等待期间新提交的任务
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight.values()].map(job => job.promise))
    }
  }
}

export class SerialDispatcher implements MainThreadDispatcher {
  private tail: Promise<unknown> = Promise.resolve()

  invoke<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn, fn)
    this.tail = result.catch(() => undefined)
    return result
  }
}
