export type {
	CallFailure,
	CallOutcome,
	CallSuccess,
	ConnectionState,
	ControlAction,
	CredentialPlacement,
	DelimitedRow,
	FailureKind,
	HttpMethod,
	JsonValue,
	Payload,
	ProviderConfig,
	RateLimitConfig,
	RequestDescriptor,
	ResponseFormat,
	StreamEvent,
} from './types.js'

export { send, buildUrl, describeOutcome } from './core/dispatcher.js'
export {
	SubscriptionManager,
	controlMessage,
	type ErrorHandler,
	type MessageHandler,
	type SubscriptionManagerOptions,
} from './core/subscription-manager.js'
export {
	wsTransport,
	type ConnectOptions,
	type StreamConnection,
	type StreamTransport,
} from './core/stream-transport.js'
export { MarketFeedError } from './core/errors.js'
export {
	loadConfig,
	resetConfigCache,
	getConfigPath,
	createProviderConfig,
	requireCredential,
	DEFAULT_TIMEOUT_MS,
	type FeedConfig,
	type ProviderConfigInput,
} from './core/config.js'
export { logger, createComponentLogger } from './core/logger.js'
export * as rateLimiter from './core/rate-limiter.js'

export { getProviderConfig, getPreset, listProviders, type ProviderInfo, type ProviderName } from './providers/registry.js'
export { createFinnhubClient, finnhubPreset, type FinnhubClient } from './providers/finnhub.js'
export {
	createAlphaVantageClient,
	alphaVantagePreset,
	type AlphaVantageClient,
} from './providers/alpha-vantage.js'
export {
	createTwelveDataClient,
	createPriceStream,
	twelveDataPreset,
	type TwelveDataClient,
} from './providers/twelve-data.js'
