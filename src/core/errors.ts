import type { FailureKind } from '../types.js'

export class MarketFeedError extends Error {
	readonly kind: FailureKind | 'config'
	readonly provider: string

	constructor(
		kind: FailureKind | 'config',
		provider: string,
		message: string,
		options?: { cause?: unknown },
	) {
		super(`[${provider}] ${message}`, options)
		this.name = 'MarketFeedError'
		this.kind = kind
		this.provider = provider
	}
}

export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err))
}
