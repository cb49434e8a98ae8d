import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

vi.mock('../../src/logger.js', () => ({
  log: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}))

const mockFetch = vi.fn()
vi.stubGlobal('fetch', mockFetch)

import { chunkKeys, CollectorClient } from '../../src/collector/client.js'
import { defaultConfig } from '../../src/config/settings.js'
import { CollectorError } from '../../src/errors.js'

const config = { ...defaultConfig().collector, baseUrl: 'http://collector.test', apiKey: 'test-secret' }

function jsonResponse(body: unknown, status = 200) {
  return { ok: status >= 200 && status < 300, status, json: async () => body }
}

function reportItem(overrides: Record<string, unknown> = {}) {
  return {
    id: 'r1',
    server_id: 'srv-1',
    counter: 3,
    client_timestamp_ms: 1_700_000_000_000,
    payload: { tps_millis: 19_500, max_players: 100, plugins: ['LuckPerms'], active_players: ['alex'] },
    ...overrides,
  }
}

describe('CollectorClient', () => {
  let client: CollectorClient

  beforeEach(() => {
    mockFetch.mockReset()
    client = new CollectorClient(config, { retryAttempts: 3, retryBaseDelayMs: 1 })
  })

  afterEach(() => {
    mockFetch.mockReset()
  })

  describe('fetchCatalog', () => {
    it('fetches the public catalog without an Authorization header', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          items: [
            { id: 'srv-1', ip: '10.0.0.1', port: 25565, active_players: 4, max_players: 20, hotkey: 'owner-a' },
            { id: 'srv-2', hostname: 'play.example.test', port: '25566' },
            { ip: '10.0.0.3' },
          ],
        }),
      )

      const catalog = await client.fetchCatalog()

      const [url, options] = mockFetch.mock.calls[0] ?? []
      expect(url).toBe('http://collector.test/servers')
      expect(options.headers.Authorization).toBeUndefined()
      expect(catalog).toEqual([
        {
          id: 'srv-1',
          host: '10.0.0.1',
          port: 25565,
          declaredActivePlayers: 4,
          declaredMaxPlayers: 20,
        },
        {
          id: 'srv-2',
          host: 'play.example.test',
          port: 25566,
          declaredActivePlayers: null,
          declaredMaxPlayers: null,
        },
      ])
    })
  })

  describe('fetchReports', () => {
    it('requests reports with the limit and Bearer auth', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ items: [reportItem()] }))

      const reports = await client.fetchReports('srv-1')

      const [url, options] = mockFetch.mock.calls[0] ?? []
      expect(url).toBe('http://collector.test/validators/servers/srv-1/reports?limit=25')
      expect(options.headers.Authorization).toBe('Bearer test-secret')
      expect(reports).toHaveLength(1)
      expect(reports[0]).toMatchObject({
        id: 'r1',
        entityId: 'srv-1',
        counter: 3,
        clientTimestampMs: 1_700_000_000_000,
      })
      expect(reports[0]?.payload.activePlayers).toEqual([
        { name: 'alex', uuid: '00000000-0000-0000-0000-000000000000', power: 0 },
      ])
    })

    it('drops report items that cannot be read', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          items: [
            reportItem(),
            reportItem({ id: 'r2', payload: { max_players: 0 } }),
            reportItem({ id: 'r3', counter: -1 }),
            'garbage',
          ],
        }),
      )

      const reports = await client.fetchReports('srv-1', 5)

      expect(mockFetch.mock.calls[0]?.[0]).toBe('http://collector.test/validators/servers/srv-1/reports?limit=5')
      expect(reports.map((r) => r.id)).toEqual(['r1'])
    })

    it('retries a 5xx and then succeeds', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse({}, 503))
        .mockResolvedValueOnce(jsonResponse({ items: [reportItem()] }))

      const reports = await client.fetchReports('srv-1')

      expect(mockFetch).toHaveBeenCalledTimes(2)
      expect(reports).toHaveLength(1)
    })

    it('does not retry a 404', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, 404))

      const err = await client.fetchReports('srv-1').catch((e: unknown) => e)

      expect(err).toBeInstanceOf(CollectorError)
      expect(err instanceof CollectorError && err.status).toBe(404)
      expect(err instanceof CollectorError && err.retryable).toBe(false)
      expect(mockFetch).toHaveBeenCalledTimes(1)
    })

    it('gives up after the configured attempts on network errors', async () => {
      mockFetch.mockRejectedValue(new Error('ECONNREFUSED'))

      await expect(client.fetchReports('srv-1')).rejects.toThrow('ECONNREFUSED')
      expect(mockFetch).toHaveBeenCalledTimes(3)
    })

    it('rejects a body without an items array', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ items: 'nope' }))

      const err = await client.fetchReports('srv-1').catch((e: unknown) => e)

      expect(err).toMatchObject({ code: 'collector_bad_response' })
      expect(mockFetch).toHaveBeenCalledTimes(1)
    })
  })

  describe('fetchEntityMappings', () => {
    it('deduplicates keys, chunks requests and groups ids by owner', async () => {
      mockFetch
        .mockResolvedValueOnce(
          jsonResponse({
            items: [
              { id: 'srv-1', hotkey: 'k1' },
              { id: 'srv-2', hotkey: 'k1' },
              { id: 'srv-1', hotkey: 'k1' },
            ],
          }),
        )
        .mockResolvedValueOnce(jsonResponse({ items: [] }))
        .mockResolvedValueOnce(jsonResponse({ items: [{ id: 7, hotkey: 'k3' }, { id: 'bad' }] }))

      const mappings = await client.fetchEntityMappings(['k1', 'k2', 'k1', 'k3', ''])

      // 3 unique keys across at most 5 chunks → one key per request
      expect(mockFetch).toHaveBeenCalledTimes(3)
      expect(mockFetch.mock.calls.map((c) => c[0])).toEqual([
        'http://collector.test/validators/servers/ids?hotkeys=k1',
        'http://collector.test/validators/servers/ids?hotkeys=k2',
        'http://collector.test/validators/servers/ids?hotkeys=k3',
      ])
      expect(mappings).toEqual({ k1: ['srv-1', 'srv-2'], k3: ['7'] })
    })

    it('skips a failed chunk and keeps the others', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse({}, 400))
        .mockResolvedValueOnce(jsonResponse({ items: [{ id: 'srv-9', hotkey: 'k2' }] }))

      const mappings = await client.fetchEntityMappings(['k1', 'k2'])

      expect(mappings).toEqual({ k2: ['srv-9'] })
    })

    it('throws when every chunk fails', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, 401))

      await expect(client.fetchEntityMappings(['k1', 'k2'])).rejects.toBeInstanceOf(CollectorError)
    })

    it('returns an empty mapping for no keys without calling the collector', async () => {
      expect(await client.fetchEntityMappings([])).toEqual({})
      expect(mockFetch).not.toHaveBeenCalled()
    })
  })

  describe('submitVote', () => {
    it('posts the payload and returns the status', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}, 201))

      const status = await client.submitVote('srv-1', { verdict: 'trusted' })

      const [url, options] = mockFetch.mock.calls[0] ?? []
      expect(url).toBe('http://collector.test/validators/servers/srv-1/vote')
      expect(options.method).toBe('POST')
      expect(options.headers.Authorization).toBe('Bearer test-secret')
      expect(JSON.parse(options.body)).toEqual({ verdict: 'trusted' })
      expect(status).toBe(201)
    })

    it('returns the failing status without retrying', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}, 500))
      expect(await client.submitVote('srv-1', {})).toBe(500)
      expect(mockFetch).toHaveBeenCalledTimes(1)
    })

    it('returns 599 on a network failure', async () => {
      mockFetch.mockRejectedValueOnce(new Error('timeout'))
      expect(await client.submitVote('srv-1', {})).toBe(599)
    })
  })
})

describe('chunkKeys', () => {
  it('splits into at most maxChunks order-preserving chunks', () => {
    expect(chunkKeys(['a', 'b', 'c', 'd', 'e', 'f', 'g'], 5)).toEqual([['a', 'b'], ['c', 'd'], ['e', 'f'], ['g']])
    expect(chunkKeys(['a', 'b'], 5)).toEqual([['a'], ['b']])
    expect(chunkKeys([], 5)).toEqual([])
  })
})
