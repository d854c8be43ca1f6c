import WebSocket, { type RawData } from 'ws'
import { MarketFeedError } from './errors.js'

export interface StreamConnection {
	send(text: string): void
	/**
	 * Resolves with the next inbound message. Rejects with a `MarketFeedError`
	 * once the connection has ended, and keeps rejecting afterwards.
	 */
	receive(): Promise<string>
	close(): void
}

export interface ConnectOptions {
	/** Provider name used to label errors. */
	provider: string
	timeoutMs: number
}

export interface StreamTransport {
	connect(url: URL, options: ConnectOptions): Promise<StreamConnection>
}

interface Waiter {
	resolve: (message: string) => void
	reject: (err: MarketFeedError) => void
}

function rawToString(data: RawData): string {
	if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8')
	if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8')
	return data.toString('utf-8')
}

class WsConnection implements StreamConnection {
	private readonly inbox: string[] = []
	private waiter: Waiter | null = null
	private ended: MarketFeedError | null = null

	constructor(
		private readonly socket: WebSocket,
		private readonly source: string,
	) {
		socket.on('message', (data) => this.push(rawToString(data)))
		socket.on('error', (err) => {
			this.end(new MarketFeedError('transport', source, err.message, { cause: err }))
		})
		socket.on('close', (code, reason) => {
			const detail = reason.length > 0 ? `: ${reason.toString('utf-8')}` : ''
			this.end(new MarketFeedError('connection-closed', source, `Connection closed (${code})${detail}`))
		})
	}

	private push(message: string): void {
		if (this.waiter) {
			const { resolve } = this.waiter
			this.waiter = null
			resolve(message)
			return
		}
		this.inbox.push(message)
	}

	private end(err: MarketFeedError): void {
		if (this.ended) return
		this.ended = err
		if (this.waiter) {
			const { reject } = this.waiter
			this.waiter = null
			reject(err)
		}
	}

	send(text: string): void {
		if (this.socket.readyState !== WebSocket.OPEN) {
			throw new MarketFeedError('connection-closed', this.source, 'Cannot send on a closed connection')
		}
		this.socket.send(text)
	}

	receive(): Promise<string> {
		const next = this.inbox.shift()
		if (next !== undefined) return Promise.resolve(next)
		if (this.ended) return Promise.reject(this.ended)
		return new Promise((resolve, reject) => {
			this.waiter = { resolve, reject }
		})
	}

	close(): void {
		if (this.socket.readyState === WebSocket.CLOSED) return
		this.socket.close()
	}
}

export const wsTransport: StreamTransport = {
	connect(url: URL, { provider, timeoutMs }: ConnectOptions): Promise<StreamConnection> {
		return new Promise((resolve, reject) => {
			const socket = new WebSocket(url, { handshakeTimeout: timeoutMs })

			const onOpen = (): void => {
				socket.off('error', onError)
				resolve(new WsConnection(socket, provider))
			}
			const onError = (err: Error): void => {
				socket.off('open', onOpen)
				reject(new MarketFeedError('transport', provider, `Could not connect: ${err.message}`, { cause: err }))
			}

			socket.once('open', onOpen)
			socket.once('error', onError)
		})
	},
}
