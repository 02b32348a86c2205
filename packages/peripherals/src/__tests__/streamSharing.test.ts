import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { Observable } from 'rxjs'
import { ConfigurationError } from '@lumenwall/system'
import {
  createSharedStream,
  createValueSubject,
  resolveStreamShareSettings,
} from '../streamSharing'
import type { StreamConnect, StreamShareSettings, StreamSource } from '../streamSharing'

describe('createSharedStream', () => {
  let clock = 0
  const now = () => clock

  const share = <T>(source: StreamSource<T>, settings: Partial<StreamShareSettings> = {}) =>
    createSharedStream(source, resolveStreamShareSettings(settings), 'test.stream', { now })

  beforeEach(() => {
    clock = 0
    vi.spyOn(console, 'debug').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  it('should replay the latest value to late subscribers and disconnect at zero', () => {
    const subject = createValueSubject(0)
    const shared = share(subject.source, { strategy: 'replay_latest' })
    const first: Array<number> = []
    const second: Array<number> = []

    const unsubscribeFirst = shared.subscribe((value) => first.push(value))
    expect(shared.isConnected()).toBe(true)
    subject.next(1)
    subject.next(2)

    const unsubscribeSecond = shared.subscribe((value) => second.push(value))
    subject.next(3)

    expect(first).toEqual([0, 1, 2, 3])
    expect(second).toEqual([2, 3])

    unsubscribeFirst()
    expect(shared.isConnected()).toBe(true)
    unsubscribeSecond()
    expect(shared.isConnected()).toBe(false)
    expect(subject.isObserved()).toBe(false)
    expect(shared.stats()).toEqual({ received: 4, delivered: 6, connects: 1, disconnects: 1 })
  })

  it('should not replay under plain sharing', () => {
    const subject = createValueSubject(0)
    const shared = share(subject.source, { strategy: 'share' })
    const late: Array<number> = []

    shared.subscribe(() => {})
    subject.next(1)
    shared.subscribe((value) => late.push(value))
    subject.next(2)

    expect(late).toEqual([2])
  })

  it('should replay a bounded buffer, limited to the replay window', () => {
    const subject = createValueSubject(0)
    const buffered = share(subject.source, { strategy: 'replay_buffer', replayBufferSize: 2 })
    const windowed = share(subject.source, {
      strategy: 'replay_buffer',
      replayBufferSize: 4,
      replayWindowMs: 100,
    })
    buffered.subscribe(() => {})
    windowed.subscribe(() => {})

    subject.next(1)
    subject.next(2)
    clock = 150
    subject.next(3)
    clock = 200

    const fromBuffer: Array<number> = []
    const fromWindow: Array<number> = []
    buffered.subscribe((value) => fromBuffer.push(value))
    windowed.subscribe((value) => fromWindow.push(value))

    expect(fromBuffer).toEqual([2, 3])
    expect(fromWindow).toEqual([3])
  })

  it('should keep the source through the grace period', () => {
    vi.useFakeTimers()
    const subject = createValueSubject(0)
    const shared = share(subject.source, { strategy: 'share', refcountGraceMs: 100 })

    const unsubscribe = shared.subscribe(() => {})
    unsubscribe()
    vi.advanceTimersByTime(50)
    expect(shared.isConnected()).toBe(true)

    const again = shared.subscribe(() => {})
    vi.advanceTimersByTime(100)
    expect(shared.isConnected()).toBe(true)

    again()
    vi.advanceTimersByTime(100)
    expect(shared.isConnected()).toBe(false)
    expect(shared.stats().connects).toBe(1)
  })

  it('should stay disconnected below the ref-count minimum', () => {
    const subject = createValueSubject(0)
    const shared = share(subject.source, { strategy: 'share', refcountMinSubscribers: 2 })
    const values: Array<number> = []

    const first = shared.subscribe((value) => values.push(value))
    expect(shared.isConnected()).toBe(false)
    expect(subject.isObserved()).toBe(false)

    shared.subscribe(() => {})
    expect(shared.isConnected()).toBe(true)
    subject.next(5)
    expect(values).toEqual([0, 5])

    first()
    expect(shared.isConnected()).toBe(false)
    expect(subject.isObserved()).toBe(false)
    expect(shared.subscriberCount()).toBe(1)
  })

  it('should auto-connect at the minimum and stay connected until closed', () => {
    const subject = createValueSubject(0)
    const shared = share(subject.source, {
      strategy: 'share_auto_connect',
      autoConnectMinSubscribers: 2,
    })
    const completed = vi.fn()

    const first = shared.subscribe({ next: () => {}, complete: completed })
    expect(shared.isConnected()).toBe(false)
    const second = shared.subscribe(() => {})
    expect(shared.isConnected()).toBe(true)

    first()
    second()
    expect(shared.isConnected()).toBe(true)

    shared.subscribe({ next: () => {}, complete: completed })
    shared.close()
    expect(shared.isConnected()).toBe(false)
    expect(completed).toHaveBeenCalledTimes(1)
    expect(() => shared.subscribe(() => {})).toThrow('Shared stream "test.stream" is closed')
  })

  it('should connect before attaching in eager mode', () => {
    const greeting: StreamConnect<string> = (subscriber) => {
      subscriber.next('hello')
    }
    const eager: Array<string> = []
    const lazy: Array<string> = []

    share(greeting, { strategy: 'share', connectMode: 'eager' }).subscribe((value) => eager.push(value))
    share(greeting, { strategy: 'share', connectMode: 'lazy' }).subscribe((value) => lazy.push(value))

    expect(eager).toEqual([])
    expect(lazy).toEqual(['hello'])
  })

  it('should deliver only the latest value of each coalescing window', () => {
    vi.useFakeTimers()
    const subject = createValueSubject(0)
    const shared = share(subject.source, { strategy: 'share', coalesceWindowMs: 50 })
    const values: Array<number> = []
    shared.subscribe((value) => values.push(value))

    subject.next(1)
    subject.next(2)
    subject.next(3)
    expect(values).toEqual([])

    vi.advanceTimersByTime(50)
    expect(values).toEqual([3])
    expect(shared.stats()).toMatchObject({ received: 4, delivered: 1 })
  })

  it('should complete subscribers when the source completes', () => {
    const subject = createValueSubject(0)
    const shared = share(subject.source)
    const completed = vi.fn()
    shared.subscribe({ next: () => {}, complete: completed })

    subject.complete()

    expect(completed).toHaveBeenCalledTimes(1)
    expect(shared.isConnected()).toBe(false)
    expect(shared.subscriberCount()).toBe(0)
  })

  it('should report source failures to subscribers without an error handler', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const failing = new Observable<number>((subscriber) => {
      subscriber.error(new Error('sensor lost'))
    })
    const shared = share(failing, { strategy: 'share' })

    shared.subscribe(() => {})

    expect(console.error).toHaveBeenCalledWith(
      '[SharedStream] "test.stream" source failed:',
      new Error('sensor lost'),
    )
    expect(shared.isConnected()).toBe(false)
    expect(shared.subscriberCount()).toBe(0)
  })

  it('should name the offending setting', () => {
    try {
      resolveStreamShareSettings({ replayBufferSize: 0 })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      if (error instanceof ConfigurationError) {
        expect(error.setting).toBe('stream.replayBufferSize')
      }
    }
  })
})

describe('createValueSubject', () => {
  it('should hold the current value', () => {
    const size = createValueSubject({ width: 64, height: 32 })
    const seen: Array<number> = []

    size.next({ width: 128, height: 32 })
    const subscription = size.source.subscribe((value) => seen.push(value.width))

    expect(seen).toEqual([128])
    expect(size.value()).toEqual({ width: 128, height: 32 })
    expect(size.isObserved()).toBe(true)
    subscription.unsubscribe()
    expect(size.isObserved()).toBe(false)
  })
})
