import { send } from '../core/dispatcher.js'
import { SubscriptionManager, type SubscriptionManagerOptions } from '../core/subscription-manager.js'
import type { CallOutcome, ProviderConfig } from '../types.js'
import type { ProviderPreset } from './types.js'

export const twelveDataPreset: ProviderPreset = {
	name: 'twelvedata',
	endpoint: 'https://api.twelvedata.com',
	credentialPlacement: 'query',
	credentialParam: 'apikey',
	rateLimits: { maxRequests: 8, windowMs: 60_000 },
	streamEndpoint: 'wss://ws.twelvedata.com/v1/quotes/price',
	keyEnvVar: 'TWELVEDATA_API_KEY',
	configKey: 'twelveDataApiKey',
}

export type Interval =
	| '1min'
	| '5min'
	| '15min'
	| '30min'
	| '45min'
	| '1h'
	| '2h'
	| '4h'
	| '1day'
	| '1week'
	| '1month'

export interface TimeSeriesOptions {
	interval?: Interval
	outputsize?: number
	timezone?: string
	format?: 'JSON' | 'CSV'
}

export interface StocksFilter {
	symbol?: string
	exchange?: string
	country?: string
	type?: string
}

// Twelve Data CSV bodies separate columns with semicolons.
const CSV_DELIMITER = ';'

function compact(params: Record<string, string | undefined>): Record<string, string> {
	const out: Record<string, string> = {}
	for (const [key, value] of Object.entries(params)) {
		if (value !== undefined && value !== '') out[key] = value
	}
	return out
}

export function createTwelveDataClient(config: ProviderConfig) {
	function request(path: string, params: Record<string, string> = {}): Promise<CallOutcome> {
		return send(config, {
			targetPath: path,
			queryParameters: params,
			method: 'GET',
			responseFormat: 'json',
		})
	}

	return {
		timeSeries: (symbol: string, options: TimeSeriesOptions = {}): Promise<CallOutcome> => {
			const format = options.format ?? 'JSON'
			return send(config, {
				targetPath: '/time_series',
				queryParameters: {
					symbol,
					interval: options.interval ?? '1day',
					outputsize: String(options.outputsize ?? 30),
					timezone: options.timezone ?? 'UTC',
					format,
				},
				method: 'GET',
				responseFormat: format === 'CSV' ? 'delimited-text' : 'json',
				...(format === 'CSV' ? { delimiter: CSV_DELIMITER } : {}),
			})
		},

		quote: (symbol: string) => request('/quote', { symbol }),

		price: (symbol: string) => request('/price', { symbol }),

		stocks: (filter: StocksFilter = {}) => request('/stocks', compact({ ...filter })),

		technicalIndicator: (
			symbol: string,
			interval: Interval,
			indicator: string,
			fields: Record<string, string | number> = {},
		) => {
			const extra: Record<string, string> = {}
			for (const [key, value] of Object.entries({ series_type: 'close', ...fields })) {
				extra[key] = String(value)
			}
			return request(`/${indicator.toLowerCase()}`, { symbol, interval, ...extra })
		},

		cryptocurrencies: () => request('/cryptocurrencies'),

		forexPairs: () => request('/forex_pairs'),

		earliestTimestamp: (symbol: string, interval: Interval, exchange?: string) =>
			request('/earliest_timestamp', compact({ symbol, interval, exchange })),
	}
}

export type TwelveDataClient = ReturnType<typeof createTwelveDataClient>

/** A price stream bound to Twelve Data's quote socket. */
export function createPriceStream(
	config: ProviderConfig,
	options: SubscriptionManagerOptions = {},
): SubscriptionManager {
	return new SubscriptionManager(config, { heartbeatIntervalMs: 10_000, ...options })
}
