export interface RateLimitConfig {
	maxRequests: number
	windowMs: number
}

export type CredentialPlacement = 'query' | 'header'

export interface ProviderConfig {
	readonly name: string
	readonly credential: string
	readonly endpoint: string
	readonly credentialPlacement: CredentialPlacement
	/** Query parameter or header name the credential travels under. */
	readonly credentialParam: string
	readonly rateLimits: Readonly<RateLimitConfig>
	readonly timeoutMs: number
	readonly streamEndpoint?: string
}

export type HttpMethod = 'GET' | 'POST'

export type ResponseFormat = 'json' | 'delimited-text'

export interface RequestDescriptor {
	targetPath: string
	queryParameters: Record<string, string>
	method: HttpMethod
	responseFormat: ResponseFormat
	/** Column separator for delimited-text bodies. Defaults to a comma. */
	delimiter?: string
}

export type FailureKind = 'transport' | 'http-status' | 'decode' | 'connection-closed'

export type JsonValue =
	| string
	| number
	| boolean
	| null
	| JsonValue[]
	| { [key: string]: JsonValue }

export type DelimitedRow = Record<string, string>

export type Payload = JsonValue | DelimitedRow[]

export interface CallSuccess<T = Payload> {
	ok: true
	payload: T
}

export interface CallFailure {
	ok: false
	kind: FailureKind
	message: string
	status?: number
}

export type CallOutcome<T = Payload> = CallSuccess<T> | CallFailure

export type ConnectionState = 'disconnected' | 'connecting' | 'subscribed' | 'receiving' | 'closing'

/** A decoded inbound stream message; only well-formedness is checked. */
export type StreamEvent = Record<string, unknown>

export type ControlAction = 'subscribe' | 'unsubscribe'
