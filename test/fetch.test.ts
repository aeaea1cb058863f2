import { getEventListeners } from 'node:events'
import { describe, expect, test } from 'vitest'
import { AbortError, mergeSignals } from '../src/utils/fetch'

describe('mergeSignals', () => {
  test('no signals gives no signal', () => {
    expect(mergeSignals([undefined, null]).signal).toBeUndefined()
  })

  test('a single signal is passed through', () => {
    const ctl = new AbortController()
    expect(mergeSignals([ctl.signal, undefined]).signal).toBe(ctl.signal)
  })

  test('aborts when any input aborts', () => {
    const a = new AbortController()
    const b = new AbortController()
    const { signal } = mergeSignals([a.signal, b.signal])

    b.abort()

    expect(signal?.aborted).toBe(true)
    expect(signal?.reason).toBeInstanceOf(AbortError)
    expect(getEventListeners(a.signal, 'abort')).toHaveLength(0)
  })

  test('an input that is already aborted aborts at once without listening', () => {
    const a = new AbortController()
    const b = new AbortController()
    a.abort()
    const { signal } = mergeSignals([a.signal, b.signal])

    expect(signal?.aborted).toBe(true)
    expect(getEventListeners(b.signal, 'abort')).toHaveLength(0)
  })

  test('dispose detaches from every input', () => {
    const a = new AbortController()
    const b = new AbortController()
    const merged = mergeSignals([a.signal, b.signal])
    expect(getEventListeners(a.signal, 'abort')).toHaveLength(1)

    merged.dispose()

    expect(getEventListeners(a.signal, 'abort')).toHaveLength(0)
    expect(getEventListeners(b.signal, 'abort')).toHaveLength(0)
    a.abort()
    expect(merged.signal?.aborted).toBe(false)
  })
})
