import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join, resolve } from 'node:path'
import { z } from 'zod'
import type { ProviderConfig } from '../types.js'
import { MarketFeedError } from './errors.js'
import { createComponentLogger } from './logger.js'

const log = createComponentLogger('config')

/** Parses one `.env` line into a key and value; comments and blanks give null. */
export function parseEnvLine(line: string): [string, string] | null {
	const trimmed = line.trim()
	if (!trimmed || trimmed.startsWith('#')) return null
	const eqIdx = trimmed.indexOf('=')
	if (eqIdx <= 0) return null
	const key = trimmed.slice(0, eqIdx).trim()
	const val = trimmed.slice(eqIdx + 1).trim()
	const quote = val[0]
	if (val.length >= 2 && (quote === '"' || quote === "'") && val.endsWith(quote)) {
		return [key, val.slice(1, -1)]
	}
	return [key, val]
}

// Existing variables win over the file
export function loadEnvFile(dir: string = process.cwd()): void {
	const envPath = resolve(dir, '.env')
	if (!existsSync(envPath)) return
	let content: string
	try {
		content = readFileSync(envPath, 'utf-8')
	} catch (err) {
		log.warn({ err, path: envPath }, 'could not read .env file')
		return
	}
	for (const line of content.split('\n')) {
		const entry = parseEnvLine(line)
		if (!entry) continue
		const [key, value] = entry
		if (process.env[key] === undefined) process.env[key] = value
	}
}

loadEnvFile()

export const DEFAULT_TIMEOUT_MS = 10_000

const fileConfigSchema = z
	.object({
		finnhubApiKey: z.string().min(1),
		alphaVantageApiKey: z.string().min(1),
		twelveDataApiKey: z.string().min(1),
		timeoutMs: z.number().int().positive(),
		disabledProviders: z.array(z.string()),
	})
	.partial()

export type FeedConfig = z.infer<typeof fileConfigSchema>

export const providerConfigSchema = z.object({
	name: z.string().min(1),
	credential: z.string().min(1),
	endpoint: z.string().url(),
	credentialPlacement: z.enum(['query', 'header']),
	credentialParam: z.string().min(1),
	rateLimits: z.object({
		maxRequests: z.number().int().positive(),
		windowMs: z.number().int().positive(),
	}),
	timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
	streamEndpoint: z.string().url().optional(),
})

export type ProviderConfigInput = z.input<typeof providerConfigSchema>

const CONFIG_DIR = join(homedir(), '.market-feed')
const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

let cached: FeedConfig | null = null

function readConfigFile(): FeedConfig {
	if (!existsSync(CONFIG_FILE)) return {}
	try {
		const parsed = fileConfigSchema.safeParse(JSON.parse(readFileSync(CONFIG_FILE, 'utf-8')))
		if (parsed.success) return parsed.data
		log.warn({ path: CONFIG_FILE, issues: parsed.error.issues }, 'ignoring invalid config file')
	} catch (err) {
		log.warn({ path: CONFIG_FILE, err }, 'ignoring unreadable config file')
	}
	return {}
}

function readTimeout(raw: string | undefined): number | undefined {
	if (!raw) return undefined
	const n = Number(raw)
	if (!Number.isInteger(n) || n <= 0) {
		log.warn({ value: raw }, 'ignoring invalid MARKET_FEED_TIMEOUT_MS')
		return undefined
	}
	return n
}

export function loadConfig(): FeedConfig {
	if (cached) return cached

	const fromEnv: FeedConfig = {
		finnhubApiKey: process.env.FINNHUB_API_KEY,
		alphaVantageApiKey: process.env.ALPHAVANTAGE_API_KEY ?? process.env.ALPHA_VANTAGE_API_KEY,
		twelveDataApiKey: process.env.TWELVEDATA_API_KEY,
		timeoutMs: readTimeout(process.env.MARKET_FEED_TIMEOUT_MS),
	}

	cached = {
		...readConfigFile(),
		// Env vars override file
		...(fromEnv.finnhubApiKey ? { finnhubApiKey: fromEnv.finnhubApiKey } : {}),
		...(fromEnv.alphaVantageApiKey ? { alphaVantageApiKey: fromEnv.alphaVantageApiKey } : {}),
		...(fromEnv.twelveDataApiKey ? { twelveDataApiKey: fromEnv.twelveDataApiKey } : {}),
		...(fromEnv.timeoutMs ? { timeoutMs: fromEnv.timeoutMs } : {}),
	}

	return cached
}

export function resetConfigCache(): void {
	cached = null
}

export function getConfigPath(): string {
	return CONFIG_FILE
}

/** Validates `input` and returns a frozen provider config. */
export function createProviderConfig(input: ProviderConfigInput): ProviderConfig {
	const parsed = providerConfigSchema.safeParse(input)
	if (!parsed.success) {
		const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
		throw new MarketFeedError('config', input.name || 'unknown', `Invalid provider config: ${detail}`)
	}
	const { rateLimits, ...rest } = parsed.data
	return Object.freeze({ ...rest, rateLimits: Object.freeze({ ...rateLimits }) })
}

export function requireCredential(
	provider: string,
	key: 'finnhubApiKey' | 'alphaVantageApiKey' | 'twelveDataApiKey',
	envVar: string,
): string {
	const value = loadConfig()[key]
	if (!value) {
		throw new MarketFeedError('config', provider, `${envVar} not set`)
	}
	return value
}
