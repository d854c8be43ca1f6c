import { createProviderConfig, DEFAULT_TIMEOUT_MS, loadConfig, requireCredential } from '../core/config.js'
import { MarketFeedError } from '../core/errors.js'
import type { ProviderConfig } from '../types.js'
import { alphaVantagePreset } from './alpha-vantage.js'
import { finnhubPreset } from './finnhub.js'
import { twelveDataPreset } from './twelve-data.js'
import type { ProviderPreset } from './types.js'

const presets: ProviderPreset[] = [finnhubPreset, alphaVantagePreset, twelveDataPreset]

export type ProviderName = 'finnhub' | 'alphavantage' | 'twelvedata'

export interface ProviderInfo {
	name: string
	keyEnvVar: string
	keyConfigured: boolean
	enabled: boolean
	rateLimit: string
	streaming: boolean
}

export function getPreset(name: string): ProviderPreset {
	const preset = presets.find((p) => p.name === name)
	if (!preset) {
		throw new Error(`Unknown provider "${name}" (known: ${presets.map((p) => p.name).join(', ')})`)
	}
	return preset
}

/** Builds the provider's session config from the loaded credentials. */
export function getProviderConfig(name: ProviderName): ProviderConfig {
	const preset = getPreset(name)
	const config = loadConfig()
	if (config.disabledProviders?.includes(name)) {
		throw new MarketFeedError('config', name, 'Provider is disabled in config')
	}
	return createProviderConfig({
		name: preset.name,
		credential: requireCredential(preset.name, preset.configKey, preset.keyEnvVar),
		endpoint: preset.endpoint,
		credentialPlacement: preset.credentialPlacement,
		credentialParam: preset.credentialParam,
		rateLimits: preset.rateLimits,
		timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
		streamEndpoint: preset.streamEndpoint,
	})
}

export function listProviders(): ProviderInfo[] {
	const config = loadConfig()
	const disabled = new Set(config.disabledProviders ?? [])
	return presets.map((p) => {
		const keyConfigured = !!config[p.configKey]
		return {
			name: p.name,
			keyEnvVar: p.keyEnvVar,
			keyConfigured,
			enabled: keyConfigured && !disabled.has(p.name),
			rateLimit: `${p.rateLimits.maxRequests}/${p.rateLimits.windowMs / 1000}s`,
			streaming: p.streamEndpoint !== undefined,
		}
	})
}
