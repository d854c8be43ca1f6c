import { EventEmitter } from 'node:events'
import type { ConnectionState, ControlAction, ProviderConfig, StreamEvent } from '../types.js'
import { decodeStreamEvent } from './decode.js'
import { MarketFeedError, toError } from './errors.js'
import { createComponentLogger } from './logger.js'
import { type StreamConnection, type StreamTransport, wsTransport } from './stream-transport.js'

const log = createComponentLogger('stream')

export type MessageHandler = (event: StreamEvent) => void | Promise<void>
export type ErrorHandler = (error: Error) => void | Promise<void>

export interface SubscriptionManagerOptions {
	transport?: StreamTransport
	/** Defaults to the provider's request timeout. */
	connectTimeoutMs?: number
	/** Sends `{"action":"heartbeat"}` at this interval while receiving. Off when unset. */
	heartbeatIntervalMs?: number
}

export function controlMessage(action: ControlAction, symbols: string[]): string {
	return JSON.stringify({ action, params: { symbols: symbols.join(',') } })
}

function normalizeSymbols(symbols: string[]): string[] {
	return symbols.map((s) => s.trim()).filter((s) => s.length > 0)
}

/**
 * Owns one streaming session: the desired symbol set, the connection state
 * machine and the receive loop.
 *
 * disconnected -> connecting -> subscribed -> receiving -> closing -> disconnected
 *
 * Emits `state` (next, previous) on every transition.
 */
export class SubscriptionManager extends EventEmitter {
	private currentState: ConnectionState = 'disconnected'
	private readonly desired = new Set<string>()
	private connection: StreamConnection | null = null
	private session: Promise<void> = Promise.resolve()
	private stopRequested = false
	private heartbeat: NodeJS.Timeout | null = null
	private onMessage: MessageHandler | null = null
	private onError: ErrorHandler | null = null
	private readonly transport: StreamTransport
	private readonly streamEndpoint: string

	constructor(
		private readonly config: ProviderConfig,
		private readonly options: SubscriptionManagerOptions = {},
	) {
		super()
		if (!config.streamEndpoint) {
			throw new MarketFeedError('config', config.name, 'No streaming endpoint configured')
		}
		this.streamEndpoint = config.streamEndpoint
		this.transport = options.transport ?? wsTransport
	}

	get state(): ConnectionState {
		return this.currentState
	}

	get symbols(): string[] {
		return [...this.desired].sort()
	}

	setHandlers(onMessage: MessageHandler, onError?: ErrorHandler): void {
		this.onMessage = onMessage
		this.onError = onError ?? null
	}

	/**
	 * Subscribes `symbols`, connects and resolves once the session has ended,
	 * either through `stop()` or a connection failure.
	 */
	async run(symbols: string[], onMessage: MessageHandler, onError?: ErrorHandler): Promise<void> {
		this.setHandlers(onMessage, onError)
		this.subscribe(symbols)
		await this.start()
		await this.session
	}

	async start(): Promise<void> {
		if (this.currentState !== 'disconnected') {
			throw new Error(`[${this.config.name}] Cannot start a stream that is ${this.currentState}`)
		}
		this.stopRequested = false
		this.transition('connecting')

		let connection: StreamConnection
		try {
			connection = await this.transport.connect(this.streamUrl(), {
				provider: this.config.name,
				timeoutMs: this.options.connectTimeoutMs ?? this.config.timeoutMs,
			})
		} catch (err) {
			this.transition('disconnected')
			throw err instanceof MarketFeedError
				? err
				: new MarketFeedError('transport', this.config.name, toError(err).message, { cause: err })
		}

		if (this.stopRequested) {
			this.transition('closing')
			connection.close()
			this.transition('disconnected')
			return
		}

		this.connection = connection
		this.transition('subscribed')
		if (this.desired.size > 0) {
			try {
				connection.send(controlMessage('subscribe', [...this.desired]))
			} catch (err) {
				this.transition('closing')
				this.teardown(connection)
				this.transition('disconnected')
				throw new MarketFeedError('transport', this.config.name, 'Could not send subscription', {
					cause: err,
				})
			}
		}
		this.transition('receiving')
		this.startHeartbeat(connection)
		this.session = this.receiveLoop(connection)
	}

	subscribe(symbols: string[]): void {
		const added = normalizeSymbols(symbols)
		for (const symbol of added) this.desired.add(symbol)
		this.sendIfConnected('subscribe', added)
	}

	unsubscribe(symbols: string[]): void {
		const removed = normalizeSymbols(symbols)
		for (const symbol of removed) this.desired.delete(symbol)
		this.sendIfConnected('unsubscribe', removed)
	}

	/**
	 * Asks the session to end. The message being handled, if any, completes
	 * first; resolves once the state is back to disconnected.
	 */
	stop(): Promise<void> {
		if (this.currentState === 'disconnected') return Promise.resolve()
		this.stopRequested = true
		this.connection?.close()
		return this.whenDisconnected()
	}

	private streamUrl(): URL {
		const url = new URL(this.streamEndpoint)
		url.searchParams.set(this.config.credentialParam, this.config.credential)
		return url
	}

	private transition(next: ConnectionState): void {
		const previous = this.currentState
		if (previous === next) return
		this.currentState = next
		log.debug({ provider: this.config.name, from: previous, to: next }, 'state change')
		this.emit('state', next, previous)
	}

	private whenDisconnected(): Promise<void> {
		if (this.currentState === 'disconnected') return Promise.resolve()
		return new Promise((resolve) => {
			const onState = (state: ConnectionState): void => {
				if (state !== 'disconnected') return
				this.off('state', onState)
				resolve()
			}
			this.on('state', onState)
		})
	}

	private sendIfConnected(action: ControlAction, symbols: string[]): void {
		const { connection } = this
		if (!connection || symbols.length === 0) return
		if (this.currentState !== 'subscribed' && this.currentState !== 'receiving') return
		try {
			connection.send(controlMessage(action, symbols))
		} catch (err) {
			// The receive loop sees the dead connection and tears the session down.
			log.warn({ provider: this.config.name, action, err }, 'control message not sent')
		}
	}

	private startHeartbeat(connection: StreamConnection): void {
		const interval = this.options.heartbeatIntervalMs
		if (!interval) return
		this.heartbeat = setInterval(() => {
			try {
				connection.send(JSON.stringify({ action: 'heartbeat' }))
			} catch (err) {
				log.warn({ provider: this.config.name, err }, 'heartbeat not sent')
			}
		}, interval)
	}

	private async receiveLoop(connection: StreamConnection): Promise<void> {
		let failure: Error | null = null

		while (!this.stopRequested) {
			let raw: string
			try {
				raw = await connection.receive()
			} catch (err) {
				if (!this.stopRequested) failure = toError(err)
				break
			}
			await this.deliver(raw)
		}

		this.transition('closing')
		if (failure) await this.reportError(failure)
		this.teardown(connection)
		this.transition('disconnected')
	}

	private async deliver(raw: string): Promise<void> {
		let event: StreamEvent
		try {
			event = decodeStreamEvent(raw)
		} catch (err) {
			await this.reportError(
				new MarketFeedError('decode', this.config.name, `Malformed message: ${toError(err).message}`, {
					cause: err,
				}),
			)
			return
		}

		if (!this.onMessage) {
			log.debug({ provider: this.config.name, event }, 'message received with no handler')
			return
		}
		try {
			await this.onMessage(event)
		} catch (err) {
			await this.reportError(toError(err))
		}
	}

	private async reportError(error: Error): Promise<void> {
		if (!this.onError) {
			log.error({ provider: this.config.name, err: error }, error.message)
			return
		}
		try {
			await this.onError(error)
		} catch (err) {
			log.error({ provider: this.config.name, err }, 'error handler threw')
		}
	}

	private teardown(connection: StreamConnection): void {
		if (this.heartbeat) {
			clearInterval(this.heartbeat)
			this.heartbeat = null
		}
		connection.close()
		if (this.connection === connection) this.connection = null
	}
}
