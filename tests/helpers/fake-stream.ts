import { MarketFeedError } from '../../src/core/errors.js'
import type { ConnectOptions, StreamConnection, StreamTransport } from '../../src/core/stream-transport.js'

interface Waiter {
	resolve: (message: string) => void
	reject: (err: Error) => void
}

/** In-process stand-in for a socket: tests push inbound frames and read what was sent. */
export class FakeConnection implements StreamConnection {
	readonly sent: string[] = []
	closed = false
	private readonly inbox: string[] = []
	private waiter: Waiter | null = null
	private ended: Error | null = null

	send(text: string): void {
		if (this.ended) throw new MarketFeedError('connection-closed', 'fake', 'Cannot send on a closed connection')
		this.sent.push(text)
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
		if (this.closed) return
		this.closed = true
		this.end(new MarketFeedError('connection-closed', 'fake', 'Connection closed (1000)'))
	}

	/** Simulates an inbound frame from the provider. */
	deliver(message: string): void {
		if (this.waiter) {
			const { resolve } = this.waiter
			this.waiter = null
			resolve(message)
			return
		}
		this.inbox.push(message)
	}

	/** Simulates the provider hanging up. */
	dropFromPeer(code = 1006): void {
		this.end(new MarketFeedError('connection-closed', 'fake', `Connection closed (${code})`))
	}

	private end(err: Error): void {
		if (this.ended) return
		this.ended = err
		if (this.waiter) {
			const { reject } = this.waiter
			this.waiter = null
			reject(err)
		}
	}
}

export class FakeTransport implements StreamTransport {
	readonly connections: FakeConnection[] = []
	readonly urls: URL[] = []
	readonly options: ConnectOptions[] = []
	failWith: Error | null = null

	async connect(url: URL, options: ConnectOptions): Promise<StreamConnection> {
		this.urls.push(url)
		this.options.push(options)
		if (this.failWith) throw this.failWith
		const connection = new FakeConnection()
		this.connections.push(connection)
		return connection
	}

	get last(): FakeConnection {
		const connection = this.connections[this.connections.length - 1]
		if (!connection) throw new Error('No connection opened yet')
		return connection
	}
}

/** Lets every pending promise callback run. */
export function flush(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve))
}
