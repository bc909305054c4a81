import {describe, expect, it} from 'vitest'

import {CancellationSource, NEVER_CANCELLED, cancellationFromSignal} from '../../utils/Cancellation'

describe('Cancellation', () => {
  it('flips the token once the source is cancelled', () => {
    const source = new CancellationSource()
    expect(source.token.isCancelled()).toBe(false)

    source.cancel()

    expect(source.token.isCancelled()).toBe(true)
  })

  it('stays cancelled when cancelled twice', () => {
    const source = new CancellationSource()
    source.cancel()
    source.cancel()

    expect(source.token.isCancelled()).toBe(true)
  })

  it('follows an abort signal', () => {
    const controller = new AbortController()
    const token = cancellationFromSignal(controller.signal)
    expect(token.isCancelled()).toBe(false)

    controller.abort()

    expect(token.isCancelled()).toBe(true)
  })

  it('provides a token that never cancels', () => {
    expect(NEVER_CANCELLED.isCancelled()).toBe(false)
  })
})
