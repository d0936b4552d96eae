/**
 * EventBus Tests
 */

import { describe, it, expect, vi } from 'vitest'
import { EventBus } from '../../main/core/event-bus'
import { silentLogger } from '../helpers/fakes'

type TestEvents = {
  ping: [value: number]
  done: []
}

describe('EventBus', () => {
  it('calls listeners in registration order with the emitted arguments', () => {
    const bus = new EventBus<TestEvents>('test', silentLogger())
    const calls: string[] = []
    bus.on('ping', value => calls.push(`a${value}`))
    bus.on('ping', value => calls.push(`b${value}`))

    bus.emit('ping', 1)

    expect(calls).toEqual(['a1', 'b1'])
  })

  it('isolates a throwing listener from the rest', () => {
    const logger = silentLogger()
    const errorSpy = vi.spyOn(logger, 'error')
    const bus = new EventBus<TestEvents>('test', logger)
    const after = vi.fn()
    bus.on('done', () => {
      throw new Error('boom')
    })
    bus.on('done', after)

    bus.emit('done')

    expect(after).toHaveBeenCalledTimes(1)
    expect(errorSpy).toHaveBeenCalledWith(expect.objectContaining({ message: 'boom' }), { bus: 'test', event: 'done' })
  })

  it('unsubscribes through the returned function', () => {
    const bus = new EventBus<TestEvents>('test', silentLogger())
    const listener = vi.fn()
    const unsubscribe = bus.on('ping', listener)

    unsubscribe()
    bus.emit('ping', 2)

    expect(listener).not.toHaveBeenCalled()
    expect(bus.listenerCount('ping')).toBe(0)
  })

  it('delivers once listeners a single time', () => {
    const bus = new EventBus<TestEvents>('test', silentLogger())
    const listener = vi.fn()
    bus.once('ping', listener)

    bus.emit('ping', 1)
    bus.emit('ping', 2)

    expect(listener).toHaveBeenCalledTimes(1)
    expect(listener).toHaveBeenCalledWith(1)
  })

  it('lets a listener unsubscribe another during emit without skipping it', () => {
    const bus = new EventBus<TestEvents>('test', silentLogger())
    const second = vi.fn()
    let unsubscribeSecond = () => {}
    bus.on('done', () => unsubscribeSecond())
    unsubscribeSecond = bus.on('done', second)

    bus.emit('done')
    bus.emit('done')

    expect(second).toHaveBeenCalledTimes(1)
  })

  it('removes every listener on clear', () => {
    const bus = new EventBus<TestEvents>('test', silentLogger())
    bus.on('ping', vi.fn())
    bus.on('done', vi.fn())

    bus.clear()

    expect(bus.listenerCount('ping')).toBe(0)
    expect(bus.listenerCount('done')).toBe(0)
  })
})
