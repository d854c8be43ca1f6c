import { send } from '../core/dispatcher.js'
import type { CallOutcome, ProviderConfig } from '../types.js'
import { type DateInput, type ProviderPreset, toIsoDate, toUnixSeconds } from './types.js'

export const finnhubPreset: ProviderPreset = {
	name: 'finnhub',
	endpoint: 'https://finnhub.io/api/v1',
	credentialPlacement: 'header',
	credentialParam: 'X-Finnhub-Token',
	rateLimits: { maxRequests: 60, windowMs: 60_000 },
	keyEnvVar: 'FINNHUB_API_KEY',
	configKey: 'finnhubApiKey',
}

export type CandleResolution = '1' | '5' | '15' | '30' | '60' | 'D' | 'W' | 'M'
export type NewsCategory = 'general' | 'forex' | 'crypto' | 'merger'
export type StatementType = 'bs' | 'ic' | 'cf'
export type Frequency = 'annual' | 'quarterly'

export function createFinnhubClient(config: ProviderConfig) {
	function request(path: string, params: Record<string, string> = {}): Promise<CallOutcome> {
		return send(config, {
			targetPath: path,
			queryParameters: params,
			method: 'GET',
			responseFormat: 'json',
		})
	}

	return {
		quote: (symbol: string) => request('/quote', { symbol }),

		companyProfile: (symbol: string) => request('/stock/profile2', { symbol }),

		companyNews: (symbol: string, from: DateInput, to: DateInput) =>
			request('/company-news', { symbol, from: toIsoDate(from), to: toIsoDate(to) }),

		marketNews: (category: NewsCategory = 'general', minId = 0) =>
			request('/news', { category, minId: String(minId) }),

		peers: (symbol: string) => request('/stock/peers', { symbol }),

		priceTarget: (symbol: string) => request('/stock/price-target', { symbol }),

		recommendationTrends: (symbol: string) => request('/stock/recommendation', { symbol }),

		earningsCalendar: (from: DateInput, to: DateInput, symbol?: string) =>
			request('/calendar/earnings', {
				from: toIsoDate(from),
				to: toIsoDate(to),
				...(symbol ? { symbol } : {}),
			}),

		ipoCalendar: (from: DateInput, to: DateInput) =>
			request('/calendar/ipo', { from: toIsoDate(from), to: toIsoDate(to) }),

		companyEarnings: (symbol: string, limit = 5) =>
			request('/stock/earnings', { symbol, limit: String(limit) }),

		epsEstimates: (symbol: string, freq: Frequency = 'quarterly') =>
			request('/stock/eps-estimate', { symbol, freq }),

		financials: (symbol: string, statement: StatementType = 'ic', freq: Frequency = 'annual') =>
			request('/stock/financials', { symbol, statement, freq }),

		dividends: (symbol: string, from: DateInput, to: DateInput) =>
			request('/stock/dividend', { symbol, from: toIsoDate(from), to: toIsoDate(to) }),

		candles: (symbol: string, resolution: CandleResolution, from: DateInput, to: DateInput) =>
			request('/stock/candle', {
				symbol,
				resolution,
				from: String(toUnixSeconds(from)),
				to: String(toUnixSeconds(to)),
			}),

		symbols: (exchange = 'US') => request('/stock/symbol', { exchange }),
	}
}

export type FinnhubClient = ReturnType<typeof createFinnhubClient>
