import { type Implementation, InitializeResultSchema, LATEST_PROTOCOL_VERSION } from '@modelcontextprotocol/sdk/types.js'
import { DEFAULT_METHODS } from '../config/defaults.js'
import type { ProtocolMethods } from '../config/schema.js'
import {
    HandshakeError,
    ParseError,
    ProtocolViolationError,
    RpcError,
    TransportError,
    errorMessage,
} from '../core/errors.js'
import { Mutex } from '../core/mutex.js'
import type { Logger } from '../logger/index.js'
import { JSONRPC_VERSION, type JsonRpcResponse, decodeResponse, encodeFrame, parseCallToolResult, parseToolList } from './protocol.js'
import type { LineTransport } from './transport.js'
import type { ClientState, ToolCallResult, ToolCaller, ToolDescriptor } from './types.js'

export const CLIENT_INFO: Implementation = { name: 'taskbridge', version: '0.1.0' }

const DEFAULT_STDERR_PEEK_MS = 200

export interface McpClientOptions {
    logger: Logger
    methods?: ProtocolMethods
    clientInfo?: Implementation
    protocolVersion?: string
    /** How long to wait for a diagnostic stderr line when stdout comes back empty. */
    stderrPeekMs?: number
}

/**
 * JSON-RPC client for a single stdio MCP connection.
 *
 * Requests are strictly sequential: the request lock is held from the moment an
 * id is assigned until the matching response line has been read, so at most one
 * request is ever outstanding and every response must echo the id just sent.
 */
export class McpClient implements ToolCaller {
    private state: ClientState = 'uninitialized'
    private nextId = 1
    private requestLock = new Mutex()
    private handshake: Promise<void> | null = null
    /** Why the client entered the failed state; rethrown by every later call. */
    private failure: Error | null = null
    private readonly logger: Logger
    private readonly methods: ProtocolMethods
    private readonly clientInfo: Implementation
    private readonly protocolVersion: string
    private readonly stderrPeekMs: number

    constructor(
        private transport: LineTransport,
        options: McpClientOptions
    ) {
        this.logger = options.logger
        this.methods = options.methods ?? DEFAULT_METHODS
        this.clientInfo = options.clientInfo ?? CLIENT_INFO
        this.protocolVersion = options.protocolVersion ?? LATEST_PROTOCOL_VERSION
        this.stderrPeekMs = options.stderrPeekMs ?? DEFAULT_STDERR_PEEK_MS
    }

    /** Creates a client and completes the initialize handshake before returning it. */
    static async connect(transport: LineTransport, options: McpClientOptions): Promise<McpClient> {
        const client = new McpClient(transport, options)
        await client.initialize()
        return client
    }

    getState(): ClientState {
        return this.state
    }

    initialize(): Promise<void> {
        if (this.state === 'closed') return Promise.reject(new TransportError('MCP client is closed'))
        this.handshake ??= this.performHandshake()
        return this.handshake
    }

    async callTool(name: string, args: Record<string, unknown> = {}): Promise<ToolCallResult> {
        await this.ensureReady()
        const result = await this.request(this.methods.callTool, { name, arguments: args })
        return parseCallToolResult(name, result)
    }

    async listTools(): Promise<ToolDescriptor[]> {
        await this.ensureReady()
        const result = await this.request(this.methods.listTools, {})
        const tools = parseToolList(result)
        if (!tools.ok) {
            throw new ProtocolViolationError(tools.error)
        }
        this.logger.debug({ count: tools.value.length }, 'mcp:tools')
        return tools.value
    }

    /**
     * Terminates the server process. A request still waiting for its response
     * fails with a TransportError.
     */
    async close(): Promise<void> {
        if (this.state === 'closed') return
        this.state = 'closed'
        await this.transport.close()
        this.logger.debug('mcp:closed')
    }

    /**
     * Synchronous best-effort teardown for exit hooks. When a request is in
     * flight the lock cannot be taken without waiting, so cleanup is skipped and
     * the process may outlive the client.
     */
    dispose(): void {
        if (this.state === 'closed') return
        const release = this.requestLock.tryAcquire()
        if (!release) {
            this.logger.warn('MCP client busy during dispose, skipping process cleanup')
            return
        }
        this.state = 'closed'
        void this.transport.close().then(release, (error: unknown) => {
            this.logger.debug({ error: errorMessage(error) }, 'mcp:dispose-failed')
            release()
        })
    }

    private async ensureReady(): Promise<void> {
        switch (this.state) {
            case 'ready':
                return
            case 'uninitialized':
            case 'initializing':
                return this.initialize()
            case 'failed':
                throw this.failure ?? new HandshakeError('MCP handshake failed')
            case 'closed':
                throw new TransportError('MCP client is closed')
        }
    }

    private async performHandshake(): Promise<void> {
        this.state = 'initializing'
        try {
            const result = await this.request(this.methods.initialize, {
                protocolVersion: this.protocolVersion,
                capabilities: {},
                clientInfo: this.clientInfo,
            })

            const info = InitializeResultSchema.safeParse(result)
            if (info.success) {
                this.logger.info(
                    { server: info.data.serverInfo.name, protocolVersion: info.data.protocolVersion },
                    'mcp:initialized'
                )
            }

            await this.notify(this.methods.initialized)
            if (this.getState() === 'initializing') this.state = 'ready'
        } catch (error) {
            if (this.getState() !== 'closed') this.state = 'failed'
            if (error instanceof RpcError) {
                this.failure = new HandshakeError(`MCP server rejected initialize: ${error.message}`, {
                    cause: error,
                })
                throw this.failure
            }
            this.failure = new HandshakeError(`MCP handshake did not complete: ${errorMessage(error)}`, {
                cause: error,
            })
            throw error
        }
    }

    private request(method: string, params: Record<string, unknown>): Promise<unknown> {
        return this.requestLock.runExclusive(async () => {
            if (this.state === 'closed') throw new TransportError('MCP client is closed')
            if (this.state === 'failed' && this.failure) throw this.failure

            const id = String(this.nextId++)
            this.logger.debug({ id, method }, 'mcp:request')
            await this.transport.sendLine(encodeFrame({ jsonrpc: JSONRPC_VERSION, id, method, params }))

            let response: JsonRpcResponse
            try {
                response = await this.readResponse(id, method)
            } catch (error) {
                this.failOnDesync(error)
                throw error
            }
            if ('error' in response) {
                const { code, message, data } = response.error
                throw new RpcError(code, `${method} failed (${code}): ${message}`, data)
            }
            return response.result
        })
    }

    /**
     * Once a frame is read out of order, later responses can no longer be
     * matched to their requests, so the connection is given up.
     */
    private failOnDesync(error: unknown): void {
        if (!(error instanceof ProtocolViolationError || error instanceof ParseError)) return
        if (this.state === 'closed' || this.state === 'failed') return
        this.state = 'failed'
        this.failure = new ProtocolViolationError(`MCP connection is out of sync: ${error.message}`, { cause: error })
        this.logger.warn({ error: error.message }, 'mcp:desync')
    }

    private notify(method: string, params?: Record<string, unknown>): Promise<void> {
        return this.requestLock.runExclusive(async () => {
            if (this.state === 'closed') throw new TransportError('MCP client is closed')
            this.logger.debug({ method }, 'mcp:notify')
            await this.transport.sendLine(
                encodeFrame(params ? { jsonrpc: JSONRPC_VERSION, method, params } : { jsonrpc: JSONRPC_VERSION, method })
            )
        })
    }

    private async readResponse(id: string, method: string): Promise<JsonRpcResponse> {
        const line = await this.transport.readLine()

        if (line.trim() === '') {
            if (this.state === 'closed') {
                throw new TransportError(`MCP client closed while waiting for '${method}'`)
            }
            const stderr = await this.transport.peekStderr(this.stderrPeekMs)
            if (stderr) {
                throw new TransportError(`Empty response from MCP server for '${method}'. Server stderr: ${stderr}`)
            }
            throw new TransportError(`Empty response from MCP server for '${method}'`)
        }

        const response = decodeResponse(line)
        if (response.id !== id) {
            throw new ProtocolViolationError(
                `Response id mismatch for '${method}': sent ${id}, received ${JSON.stringify(response.id)}`
            )
        }
        return response
    }
}
