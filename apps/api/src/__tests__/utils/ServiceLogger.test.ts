import type {GenerationStreamEvent} from '@moodlist/shared-types'
import {describe, expect, it} from 'vitest'

import {ServiceLogger} from '../../utils/ServiceLogger'

class RecordingWriter {
  readonly events: GenerationStreamEvent[] = []

  writeAsync(event: GenerationStreamEvent): void {
    this.events.push(event)
  }
}

describe('ServiceLogger', () => {
  it('prefixes messages with the service name', () => {
    new ServiceLogger('Engine').info('Round 1 started')

    expect(console.log).toHaveBeenCalledWith('[Engine] Round 1 started')
  })

  it('routes levels to the matching console method', () => {
    const logger = new ServiceLogger('Engine')

    logger.warn('slow lookup', {title: 'Holocene'})
    logger.error('generator failed', new Error('quota exceeded'))

    expect(console.warn).toHaveBeenCalledWith('[Engine] slow lookup', {title: 'Holocene'})
    expect(console.error).toHaveBeenCalledWith(
      '[Engine] generator failed',
      expect.objectContaining({error: 'quota exceeded'}),
    )
  })

  it('stringifies non-Error values passed to error', () => {
    new ServiceLogger('Engine').error('odd failure', 'boom', {round: 2})

    expect(console.error).toHaveBeenCalledWith('[Engine] odd failure', {error: 'boom', round: 2})
  })

  it('drops messages below the minimum level', () => {
    const logger = new ServiceLogger('Cli', {minLevel: 'warn'})

    logger.debug('noise')
    logger.info('progress')

    expect(console.log).not.toHaveBeenCalled()
  })

  it('hides debug messages by default', () => {
    new ServiceLogger('Engine').debug('lookup detail')

    expect(console.log).not.toHaveBeenCalled()
  })

  it('forwards non-debug messages to the stream writer', () => {
    const writer = new RecordingWriter()
    const logger = new ServiceLogger('Stream', {minLevel: 'debug', sseWriter: writer})

    logger.debug('not streamed')
    logger.info('Round 1: 2/3 tracks')

    expect(writer.events).toEqual([{data: {level: 'info', message: '[Stream] Round 1: 2/3 tracks'}, type: 'log'}])
  })

  it('hands level and writer down to children', () => {
    const writer = new RecordingWriter()
    const child = new ServiceLogger('Stream', {minLevel: 'warn', sseWriter: writer}).child('Engine')

    child.info('skipped')
    child.warn('kept')

    expect(writer.events).toEqual([{data: {level: 'warn', message: '[Stream:Engine] kept'}, type: 'log'}])
  })
})
