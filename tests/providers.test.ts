import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createProviderConfig } from '../src/core/config.js'
import { resetWindow } from '../src/core/rate-limiter.js'
import { alphaVantagePreset, createAlphaVantageClient } from '../src/providers/alpha-vantage.js'
import { createFinnhubClient, finnhubPreset } from '../src/providers/finnhub.js'
import { createPriceStream, createTwelveDataClient, twelveDataPreset } from '../src/providers/twelve-data.js'
import type { ProviderPreset } from '../src/providers/types.js'
import { toIsoDate, toUnixSeconds } from '../src/providers/types.js'
import { FakeTransport } from './helpers/fake-stream.js'

function configFor(preset: ProviderPreset) {
	return createProviderConfig({
		name: preset.name,
		credential: 'test-key',
		endpoint: preset.endpoint,
		credentialPlacement: preset.credentialPlacement,
		credentialParam: preset.credentialParam,
		rateLimits: preset.rateLimits,
		streamEndpoint: preset.streamEndpoint,
	})
}

function mockFetch(body: string) {
	const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(body))
	vi.stubGlobal('fetch', fetchMock)
	return fetchMock
}

function requestedUrl(fetchMock: ReturnType<typeof mockFetch>): string {
	return String(fetchMock.mock.calls[0][0])
}

describe('finnhub', () => {
	const client = createFinnhubClient(configFor(finnhubPreset))

	beforeEach(() => {
		resetWindow('finnhub')
	})

	afterEach(() => {
		vi.unstubAllGlobals()
	})

	it('sends the token in a header and passes the payload through', async () => {
		const fetchMock = mockFetch('{"c":190.5,"d":1.2,"dp":0.63}')

		const outcome = await client.quote('AAPL')

		expect(requestedUrl(fetchMock)).toBe('https://finnhub.io/api/v1/quote?symbol=AAPL')
		expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
			Accept: 'application/json',
			'X-Finnhub-Token': 'test-key',
		})
		expect(outcome).toEqual({ ok: true, payload: { c: 190.5, d: 1.2, dp: 0.63 } })
	})

	it('converts candle date bounds to unix seconds', async () => {
		const fetchMock = mockFetch('{"s":"no_data"}')

		await client.candles('AAPL', 'D', '2024-01-01', '2024-01-31')

		expect(requestedUrl(fetchMock)).toBe(
			'https://finnhub.io/api/v1/stock/candle?symbol=AAPL&resolution=D&from=1704067200&to=1706659200',
		)
	})

	it('formats news date bounds as calendar dates', async () => {
		const fetchMock = mockFetch('[]')

		await client.companyNews('MSFT', new Date('2024-03-01T15:30:00Z'), '2024-03-08')

		expect(requestedUrl(fetchMock)).toBe(
			'https://finnhub.io/api/v1/company-news?symbol=MSFT&from=2024-03-01&to=2024-03-08',
		)
	})

	it('leaves the symbol out of the earnings calendar when not given', async () => {
		const fetchMock = mockFetch('{"earningsCalendar":[]}')

		await client.earningsCalendar('2024-04-01', '2024-04-30')

		expect(requestedUrl(fetchMock)).toBe(
			'https://finnhub.io/api/v1/calendar/earnings?from=2024-04-01&to=2024-04-30',
		)
	})
})

describe('alpha vantage', () => {
	const client = createAlphaVantageClient(configFor(alphaVantagePreset))

	beforeEach(() => {
		resetWindow('alphavantage')
	})

	afterEach(() => {
		vi.unstubAllGlobals()
	})

	it('selects the endpoint with the function parameter', async () => {
		const fetchMock = mockFetch('{"Symbol":"IBM"}')

		await client.companyOverview('IBM')

		expect(requestedUrl(fetchMock)).toBe(
			'https://www.alphavantage.co/query?function=OVERVIEW&symbol=IBM&apikey=test-key',
		)
	})

	it('decodes CSV time series into rows', async () => {
		const fetchMock = mockFetch('timestamp,open,high,low,close,volume\n2024-01-02,160.1,162.0,159.5,161.2,4100000\n')

		const outcome = await client.dailyTimeSeries('IBM', 'compact', 'csv')

		expect(requestedUrl(fetchMock)).toBe(
			'https://www.alphavantage.co/query?function=TIME_SERIES_DAILY&symbol=IBM&outputsize=compact&datatype=csv&apikey=test-key',
		)
		expect(outcome).toEqual({
			ok: true,
			payload: [
				{
					timestamp: '2024-01-02',
					open: '160.1',
					high: '162.0',
					low: '159.5',
					close: '161.2',
					volume: '4100000',
				},
			],
		})
	})

	it('asks for CSV listing status', async () => {
		const fetchMock = mockFetch('symbol,name,exchange\nIBM,International Business Machines,NYSE\n')

		const outcome = await client.listingStatus()

		expect(requestedUrl(fetchMock)).toBe(
			'https://www.alphavantage.co/query?function=LISTING_STATUS&state=active&datatype=csv&apikey=test-key',
		)
		expect(outcome).toEqual({
			ok: true,
			payload: [{ symbol: 'IBM', name: 'International Business Machines', exchange: 'NYSE' }],
		})
	})
})

describe('twelve data', () => {
	const config = configFor(twelveDataPreset)
	const client = createTwelveDataClient(config)

	beforeEach(() => {
		resetWindow('twelvedata')
	})

	afterEach(() => {
		vi.unstubAllGlobals()
	})

	it('requests semicolon-separated CSV time series', async () => {
		const fetchMock = mockFetch('datetime;open;close\n2024-01-02;187.15;185.64\n')

		const outcome = await client.timeSeries('AAPL', { format: 'CSV' })

		expect(requestedUrl(fetchMock)).toBe(
			'https://api.twelvedata.com/time_series?symbol=AAPL&interval=1day&outputsize=30&timezone=UTC&format=CSV&apikey=test-key',
		)
		expect(outcome).toEqual({
			ok: true,
			payload: [{ datetime: '2024-01-02', open: '187.15', close: '185.64' }],
		})
	})

	it('drops empty filters from the stocks list', async () => {
		const fetchMock = mockFetch('{"data":[]}')

		await client.stocks({ exchange: 'NASDAQ', country: '' })

		expect(requestedUrl(fetchMock)).toBe('https://api.twelvedata.com/stocks?exchange=NASDAQ&apikey=test-key')
	})

	it('routes technical indicators by name', async () => {
		const fetchMock = mockFetch('{"values":[]}')

		await client.technicalIndicator('AAPL', '1h', 'RSI', { time_period: 14 })

		expect(requestedUrl(fetchMock)).toBe(
			'https://api.twelvedata.com/rsi?symbol=AAPL&interval=1h&series_type=close&time_period=14&apikey=test-key',
		)
	})

	it('lets the caller override the indicator series type', async () => {
		const fetchMock = mockFetch('{"values":[]}')

		await client.technicalIndicator('AAPL', '1day', 'sma', { series_type: 'open', time_period: 20 })

		expect(requestedUrl(fetchMock)).toBe(
			'https://api.twelvedata.com/sma?symbol=AAPL&interval=1day&series_type=open&time_period=20&apikey=test-key',
		)
	})

	it('filters the stocks list by symbol', async () => {
		const fetchMock = mockFetch('{"data":[]}')

		await client.stocks({ symbol: 'AAPL', exchange: 'NASDAQ' })

		expect(requestedUrl(fetchMock)).toBe('https://api.twelvedata.com/stocks?symbol=AAPL&exchange=NASDAQ&apikey=test-key')
	})

	it('opens the price stream with the key on the socket URL', async () => {
		const transport = new FakeTransport()
		const stream = createPriceStream(config, { transport, heartbeatIntervalMs: 0 })
		stream.subscribe(['AAPL', 'EUR/USD'])

		await stream.start()

		expect(transport.urls[0].toString()).toBe('wss://ws.twelvedata.com/v1/quotes/price?apikey=test-key')
		expect(transport.last.sent).toEqual(['{"action":"subscribe","params":{"symbols":"AAPL,EUR/USD"}}'])
		await stream.stop()
	})
})

describe('date helpers', () => {
	it('accepts dates, unix seconds and calendar strings', () => {
		expect(toUnixSeconds('2024-01-01')).toBe(1704067200)
		expect(toUnixSeconds(1704067200.9)).toBe(1704067200)
		expect(toUnixSeconds(new Date('2024-01-01T00:00:30Z'))).toBe(1704067230)
		expect(toIsoDate(1704067200)).toBe('2024-01-01')
	})

	it('rejects unparseable dates', () => {
		expect(() => toUnixSeconds('next tuesday')).toThrow('Invalid date: next tuesday')
	})
})
