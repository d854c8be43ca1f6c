import { send } from '../core/dispatcher.js'
import type { CallOutcome, ProviderConfig } from '../types.js'
import type { ProviderPreset } from './types.js'

export const alphaVantagePreset: ProviderPreset = {
	name: 'alphavantage',
	endpoint: 'https://www.alphavantage.co/query',
	credentialPlacement: 'query',
	credentialParam: 'apikey',
	rateLimits: { maxRequests: 5, windowMs: 60_000 },
	keyEnvVar: 'ALPHAVANTAGE_API_KEY',
	configKey: 'alphaVantageApiKey',
}

export type OutputSize = 'compact' | 'full'
export type DataType = 'json' | 'csv'

// Every Alpha Vantage call hits the same path; `function` selects the endpoint.
export function createAlphaVantageClient(config: ProviderConfig) {
	function request(
		fn: string,
		params: Record<string, string> = {},
		datatype: DataType = 'json',
	): Promise<CallOutcome> {
		return send(config, {
			targetPath: '',
			queryParameters: {
				function: fn,
				...params,
				...(datatype === 'csv' ? { datatype } : {}),
			},
			method: 'GET',
			responseFormat: datatype === 'csv' ? 'delimited-text' : 'json',
		})
	}

	return {
		dailyTimeSeries: (symbol: string, outputsize: OutputSize = 'compact', datatype: DataType = 'json') =>
			request('TIME_SERIES_DAILY', { symbol, outputsize }, datatype),

		globalQuote: (symbol: string) => request('GLOBAL_QUOTE', { symbol }),

		searchSymbol: (keywords: string) => request('SYMBOL_SEARCH', { keywords }),

		companyOverview: (symbol: string) => request('OVERVIEW', { symbol }),

		etfProfile: (symbol: string) => request('ETF_PROFILE', { symbol }),

		earnings: (symbol: string) => request('EARNINGS', { symbol }),

		incomeStatement: (symbol: string) => request('INCOME_STATEMENT', { symbol }),

		balanceSheet: (symbol: string) => request('BALANCE_SHEET', { symbol }),

		cashFlow: (symbol: string) => request('CASH_FLOW', { symbol }),

		dividends: (symbol: string) => request('DIVIDENDS', { symbol }),

		splits: (symbol: string) => request('SPLITS', { symbol }),

		topGainersLosers: () => request('TOP_GAINERS_LOSERS'),

		// The two calendar endpoints and listing status only answer in CSV.
		listingStatus: (state: 'active' | 'delisted' = 'active') =>
			request('LISTING_STATUS', { state }, 'csv'),

		earningsCalendar: (horizon: '3month' | '6month' | '12month' = '3month') =>
			request('EARNINGS_CALENDAR', { horizon }, 'csv'),

		ipoCalendar: () => request('IPO_CALENDAR', {}, 'csv'),
	}
}

export type AlphaVantageClient = ReturnType<typeof createAlphaVantageClient>
