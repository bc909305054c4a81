/**
 * Test setup for @moodlist/api
 */

import {beforeEach, vi} from 'vitest'

beforeEach(() => {
  // No test may reach the network: tests that talk to Spotify stub fetch themselves
  vi.stubGlobal(
    'fetch',
    vi.fn(() => Promise.reject(new Error('Unexpected network call in test'))),
  )

  // Keep logger output out of the test report
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
})
