/**
 * 类型化事件总线
 *
 * 监听器按注册顺序同步执行，单个监听器抛错不影响后续监听器
 */

import { createModuleLogger, type Logger } from '../utils/logger'
import { toError } from '../utils/errors'

export type EventMap = Record<string, unknown[]>

export type EventListener<Args extends unknown[]> = (...args: Args) => void

export class EventBus<M extends EventMap> {
  private listeners: { [K in keyof M]?: EventListener<M[K]>[] } = {}

  constructor(
    private readonly name = 'event-bus',
    private readonly logger: Logger = createModuleLogger('event-bus')
  ) {}

  /**
   * 订阅事件，返回取消订阅函数
   */
  on<K extends keyof M>(event: K, listener: EventListener<M[K]>): () => void {
    const list = this.listeners[event] ?? []
    list.push(listener)
    this.listeners[event] = list
    return () => this.off(event, listener)
  }

  once<K extends keyof M>(event: K, listener: EventListener<M[K]>): () => void {
    const wrapper: EventListener<M[K]> = (...args) => {
      unsubscribe()
      listener(...args)
    }
    const unsubscribe = this.on(event, wrapper)
    return unsubscribe
  }

  off<K extends keyof M>(event: K, listener: EventListener<M[K]>): void {
    const list = this.listeners[event]
    if (!list) return
    const index = list.indexOf(listener)
    if (index > -1) {
      list.splice(index, 1)
    }
  }

  emit<K extends keyof M>(event: K, ...args: M[K]): void {
    const list = this.listeners[event]
    if (!list || list.length === 0) return

    // 复制一份，避免监听器在回调中取消订阅影响遍历
    for (const listener of list.slice()) {
      try {
        listener(...args)
      } catch (error) {
        this.logger.error(toError(error), { bus: this.name, event: String(event) })
      }
    }
  }

  listenerCount<K extends keyof M>(event: K): number {
    return this.listeners[event]?.length ?? 0
  }

  clear(): void {
    this.listeners = {}
  }
}
