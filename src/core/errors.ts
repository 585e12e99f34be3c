export type ErrorKind = 'transient' | 'permanent'

export type ErrorCode =
    | 'transport_io'
    | 'protocol_violation'
    | 'parse'
    | 'handshake_failed'
    | 'rpc_error'
    | 'tool_not_found'
    | 'tool_execution'
    | 'endpoint'
    | 'config'

export class TaskBridgeError extends Error {
    readonly kind: ErrorKind
    readonly code: ErrorCode

    constructor(message: string, code: ErrorCode, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'TaskBridgeError'
        this.code = code
        this.kind = kind
    }
}

/** Pipe or process failure on the server connection. */
export class TransportError extends TaskBridgeError {
    constructor(message: string, options?: ErrorOptions, kind: ErrorKind = 'transient') {
        super(message, 'transport_io', kind, options)
        this.name = 'TransportError'
    }
}

/** The server process never ran, e.g. its executable does not exist. */
export class ServerStartError extends TransportError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options, 'permanent')
        this.name = 'ServerStartError'
    }
}

/** Response id mismatch or a frame that is not a response envelope. */
export class ProtocolViolationError extends TaskBridgeError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'protocol_violation', 'permanent', options)
        this.name = 'ProtocolViolationError'
    }
}

export class ParseError extends TaskBridgeError {
    readonly text: string

    constructor(message: string, text: string, options?: ErrorOptions) {
        super(message, 'parse', 'permanent', options)
        this.name = 'ParseError'
        this.text = text
    }
}

export class HandshakeError extends TaskBridgeError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'handshake_failed', 'permanent', options)
        this.name = 'HandshakeError'
    }
}

/** The server answered a request with a JSON-RPC error object. */
export class RpcError extends TaskBridgeError {
    readonly rpcCode: number
    readonly data: unknown

    constructor(rpcCode: number, message: string, data?: unknown) {
        super(message, 'rpc_error', 'permanent')
        this.name = 'RpcError'
        this.rpcCode = rpcCode
        this.data = data
    }
}

export class ToolNotFoundError extends TaskBridgeError {
    constructor(toolName: string) {
        super(`Unknown tool: ${toolName}`, 'tool_not_found', 'permanent')
        this.name = 'ToolNotFoundError'
    }
}

export class ToolExecutionError extends TaskBridgeError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'tool_execution', 'permanent', options)
        this.name = 'ToolExecutionError'
    }
}

export class EndpointError extends TaskBridgeError {
    readonly status: number | undefined

    constructor(message: string, status?: number, options?: ErrorOptions) {
        super(message, 'endpoint', status === undefined ? 'transient' : classifyHttpError(status), options)
        this.name = 'EndpointError'
        this.status = status
    }
}

export class ConfigError extends TaskBridgeError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'config', 'permanent', options)
        this.name = 'ConfigError'
    }
}

export function classifyHttpError(status: number): ErrorKind {
    if ([429, 500, 502, 503, 504].includes(status)) return 'transient'
    return 'permanent'
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof TaskBridgeError) return error.kind
    if (error instanceof TypeError && error.message.includes('fetch')) return 'transient'
    return 'permanent'
}

/**
 * Errors that leave the server connection unusable. These abort the whole
 * command instead of being reported back to the model as a failed tool call.
 */
export function isFatalConnectionError(error: unknown): boolean {
    return (
        error instanceof TransportError ||
        error instanceof ProtocolViolationError ||
        error instanceof ParseError ||
        error instanceof HandshakeError
    )
}
