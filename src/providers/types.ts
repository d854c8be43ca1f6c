import type { CredentialPlacement, RateLimitConfig } from '../types.js'

export type CredentialKey = 'finnhubApiKey' | 'alphaVantageApiKey' | 'twelveDataApiKey'

export interface ProviderPreset {
	name: string
	endpoint: string
	credentialPlacement: CredentialPlacement
	credentialParam: string
	rateLimits: RateLimitConfig
	streamEndpoint?: string
	keyEnvVar: string
	configKey: CredentialKey
}

export type DateInput = Date | number | string

/** Unix seconds from a Date, a unix timestamp, or a YYYY-MM-DD string. */
export function toUnixSeconds(value: DateInput): number {
	if (typeof value === 'number') return Math.floor(value)
	const date = typeof value === 'string' ? new Date(`${value}T00:00:00Z`) : value
	const ms = date.getTime()
	if (Number.isNaN(ms)) throw new Error(`Invalid date: ${String(value)}`)
	return Math.floor(ms / 1000)
}

/** YYYY-MM-DD from a Date, a unix timestamp in seconds, or a date string. */
export function toIsoDate(value: DateInput): string {
	if (typeof value === 'string') return value
	const date = typeof value === 'number' ? new Date(value * 1000) : value
	return date.toISOString().split('T')[0]
}
