import type { CallFailure, CallOutcome, Payload, ProviderConfig, RequestDescriptor } from '../types.js'
import { decodeDelimited, decodeJson } from './decode.js'
import { createComponentLogger } from './logger.js'
import { acquire } from './rate-limiter.js'

const log = createComponentLogger('dispatcher')

const BODY_EXCERPT_LENGTH = 200

export function buildUrl(config: ProviderConfig, descriptor: RequestDescriptor): URL {
	const base = config.endpoint.replace(/\/+$/, '')
	const path = descriptor.targetPath.replace(/^\/+/, '')
	const url = new URL(path ? `${base}/${path}` : base)
	for (const [key, value] of Object.entries(descriptor.queryParameters)) {
		url.searchParams.set(key, value)
	}
	if (config.credentialPlacement === 'query') {
		url.searchParams.set(config.credentialParam, config.credential)
	}
	return url
}

function buildHeaders(config: ProviderConfig, descriptor: RequestDescriptor): Record<string, string> {
	const headers: Record<string, string> = {
		Accept: descriptor.responseFormat === 'json' ? 'application/json' : 'text/csv, text/plain',
	}
	if (config.credentialPlacement === 'header') {
		headers[config.credentialParam] = config.credential
	}
	return headers
}

function describeCause(err: unknown): string {
	if (err instanceof Error) {
		if (err.name === 'TimeoutError') return 'Request timed out'
		const cause = err.cause instanceof Error ? `: ${err.cause.message}` : ''
		return `${err.message}${cause}`
	}
	return String(err)
}

function decodeBody(text: string, descriptor: RequestDescriptor): Payload {
	if (descriptor.responseFormat === 'delimited-text') {
		return decodeDelimited(text, descriptor.delimiter)
	}
	return decodeJson(text)
}

function fail(config: ProviderConfig, path: string, failure: CallFailure): CallFailure {
	log.warn({ provider: config.name, path, kind: failure.kind, status: failure.status }, failure.message)
	return failure
}

/**
 * Issues one request once the provider's rate limiter grants a slot. Every
 * failure comes back as a `CallFailure`; the returned promise never rejects.
 */
export async function send(
	config: ProviderConfig,
	descriptor: RequestDescriptor,
): Promise<CallOutcome> {
	await acquire(config.name, config.rateLimits)

	const url = buildUrl(config, descriptor)
	const path = descriptor.targetPath

	let res: Response
	let body: string
	try {
		res = await fetch(url, {
			method: descriptor.method,
			headers: buildHeaders(config, descriptor),
			signal: AbortSignal.timeout(config.timeoutMs),
		})
		body = await res.text()
	} catch (err) {
		return fail(config, path, { ok: false, kind: 'transport', message: describeCause(err) })
	}

	if (!res.ok) {
		const excerpt = body.slice(0, BODY_EXCERPT_LENGTH)
		return fail(config, path, {
			ok: false,
			kind: 'http-status',
			status: res.status,
			message: `${res.status} ${res.statusText}: ${excerpt}`.trim(),
		})
	}

	let payload: Payload
	try {
		payload = decodeBody(body, descriptor)
	} catch (err) {
		return fail(config, path, {
			ok: false,
			kind: 'decode',
			message: `Could not decode ${descriptor.responseFormat} body: ${describeCause(err)}`,
		})
	}

	log.debug({ provider: config.name, path, status: res.status }, 'request succeeded')
	return { ok: true, payload }
}

export function describeOutcome(outcome: CallOutcome): string {
	if (outcome.ok) {
		const { payload } = outcome
		const size = Array.isArray(payload) ? `${payload.length} items` : typeof payload
		return `ok (${size})`
	}
	return `${outcome.kind} failure: ${outcome.message}`
}
