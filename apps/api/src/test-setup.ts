/**
 * Test setup for @radio/api
 * Outbound HTTP is mocked; no test reaches Spotify, ReccoBeats or a model provider
 */

import {vi} from 'vitest'

import {ServiceLogger} from './utils/ServiceLogger'

// Mock global fetch for external API calls
global.fetch = vi.fn()

// Request and failure-path logs are noise in test output
ServiceLogger.setLevel('error')
