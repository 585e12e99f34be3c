import { describe, it, expect } from 'vitest'
import { LATEST_PROTOCOL_VERSION } from '@modelcontextprotocol/sdk/types.js'
import { HandshakeError, ProtocolViolationError, RpcError, TransportError } from '../../../src/core/errors.js'
import { McpClient } from '../../../src/mcp/client.js'
import {
    type ClientFrame,
    type FrameHandler,
    FakeServerTransport,
    resultLine,
    taskServerHandler,
    textResult,
} from '../../helpers/fake-mcp-server.js'
import { silentLogger } from '../../helpers/logger.js'

const options = { logger: silentLogger, stderrPeekMs: 5 }

function server(overrides: Partial<Record<string, (frame: ClientFrame) => string[]>> = {}): FrameHandler {
    const base = taskServerHandler({ tools: { echo: (args) => textResult(args) } })
    return (frame) => overrides[frame.method]?.(frame) ?? base(frame)
}

/** Transport whose stdout reads stay pending until released or closed. */
class GatedTransport extends FakeServerTransport {
    private waiting: Array<(line: string) => void> = []

    override readLine(): Promise<string> {
        return new Promise((resolve) => this.waiting.push(resolve))
    }

    release(line: string): void {
        this.waiting.shift()?.(line)
    }

    override async close(): Promise<void> {
        await super.close()
        for (const resolve of this.waiting.splice(0)) resolve('')
    }
}

describe('McpClient handshake', () => {
    it('sends initialize then the initialized notification before becoming ready', async () => {
        const transport = new FakeServerTransport(server())
        const client = await McpClient.connect(transport, options)

        expect(transport.methods).toEqual(['initialize', 'notifications/initialized'])
        expect(transport.sent[0]).toEqual({
            jsonrpc: '2.0',
            id: '1',
            method: 'initialize',
            params: {
                protocolVersion: LATEST_PROTOCOL_VERSION,
                capabilities: {},
                clientInfo: { name: 'taskbridge', version: '0.1.0' },
            },
        })
        expect(transport.sent[1]).toEqual({ jsonrpc: '2.0', method: 'notifications/initialized' })
        expect(client.getState()).toBe('ready')
    })

    it('completes the handshake before the first call on an unconnected client', async () => {
        const transport = new FakeServerTransport(server())
        const client = new McpClient(transport, options)
        expect(client.getState()).toBe('uninitialized')

        await client.callTool('echo', { a: 1 })

        expect(transport.methods).toEqual(['initialize', 'notifications/initialized', 'tools/call'])
    })

    it('runs the handshake once for concurrent first calls', async () => {
        const transport = new FakeServerTransport(server())
        const client = new McpClient(transport, options)

        await Promise.all([client.callTool('echo'), client.listTools()])

        expect(transport.methods.filter((m) => m === 'initialize')).toHaveLength(1)
        expect(transport.methods.slice(0, 2)).toEqual(['initialize', 'notifications/initialized'])
    })

    it('fails permanently when the server rejects initialize', async () => {
        const transport = new FakeServerTransport(
            taskServerHandler({ initializeError: { code: -32600, message: 'unsupported protocol version' } })
        )
        const client = new McpClient(transport, options)

        await expect(client.initialize()).rejects.toThrow(
            'MCP server rejected initialize: initialize failed (-32600): unsupported protocol version'
        )
        expect(client.getState()).toBe('failed')

        await expect(client.callTool('echo')).rejects.toBeInstanceOf(HandshakeError)
        expect(transport.methods).toEqual(['initialize'])
    })

    it('surfaces a transport failure during the handshake as-is and refuses later calls', async () => {
        const transport = new FakeServerTransport(server({ initialize: () => [] }))
        const client = new McpClient(transport, options)

        await expect(client.initialize()).rejects.toBeInstanceOf(TransportError)
        expect(client.getState()).toBe('failed')
        await expect(client.listTools()).rejects.toThrow(
            "MCP handshake did not complete: Empty response from MCP server for 'initialize'"
        )
    })

    it('uses configured method names', async () => {
        const transport = new FakeServerTransport((frame) => {
            if (frame.id === undefined) return []
            if (frame.method === 'init') return [resultLine(frame.id, { capabilities: {} })]
            if (frame.method === 'tool/invoke') return [resultLine(frame.id, textResult('ok'))]
            return []
        })
        const client = await McpClient.connect(transport, {
            ...options,
            methods: { initialize: 'init', initialized: 'ready', callTool: 'tool/invoke', listTools: 'tool/list' },
        })

        await client.callTool('anything')

        expect(transport.methods).toEqual(['init', 'ready', 'tool/invoke'])
    })
})

describe('McpClient requests', () => {
    it('assigns strictly increasing string ids', async () => {
        const transport = new FakeServerTransport(server())
        const client = await McpClient.connect(transport, options)

        await client.callTool('echo')
        await client.listTools()
        await client.callTool('echo')

        expect(transport.sent.map((frame) => frame.id)).toEqual(['1', undefined, '2', '3', '4'])
    })

    it('gives concurrent callers unique ids and their own responses', async () => {
        const transport = new FakeServerTransport(server())
        const client = await McpClient.connect(transport, options)

        const [a, b, c] = await Promise.all([
            client.callTool('echo', { n: 1 }),
            client.callTool('echo', { n: 2 }),
            client.callTool('echo', { n: 3 }),
        ])

        expect([a, b, c].map((r) => r.content[0])).toEqual([
            { type: 'text', text: '{"n":1}' },
            { type: 'text', text: '{"n":2}' },
            { type: 'text', text: '{"n":3}' },
        ])
        const ids = transport.sent.flatMap((frame) => (frame.id === undefined ? [] : [frame.id]))
        expect(new Set(ids).size).toBe(ids.length)
    })

    it('sends the tool name and an empty arguments object by default', async () => {
        const transport = new FakeServerTransport(server())
        const client = await McpClient.connect(transport, options)

        await client.callTool('echo')

        expect(transport.sent[2]?.params).toEqual({ name: 'echo', arguments: {} })
    })

    it('rejects a response whose id differs from the id just sent', async () => {
        const transport = new FakeServerTransport(server({ 'tools/call': () => [resultLine('7', textResult('x'))] }))
        const client = await McpClient.connect(transport, options)

        const call = client.callTool('echo')
        await expect(call).rejects.toBeInstanceOf(ProtocolViolationError)
        await expect(call).rejects.toThrow(`Response id mismatch for 'tools/call': sent 2, received "7"`)
    })

    it('treats a numeric id as a mismatch for the string id sent', async () => {
        const transport = new FakeServerTransport(
            server({ 'tools/call': (frame) => [resultLine(Number(frame.id), textResult('x'))] })
        )
        const client = await McpClient.connect(transport, options)

        await expect(client.callTool('echo')).rejects.toThrow(
            "Response id mismatch for 'tools/call': sent 2, received 2"
        )
    })

    it('gives up the connection after a frame that is not the awaited response', async () => {
        const notice = JSON.stringify({ jsonrpc: '2.0', method: 'notifications/message', params: { level: 'info' } })
        const transport = new FakeServerTransport(
            server({ 'tools/call': (frame) => [notice, resultLine(frame.id ?? null, textResult('late'))] })
        )
        const client = await McpClient.connect(transport, options)

        await expect(client.callTool('echo')).rejects.toThrow(
            'Expected a JSON-RPC response, got a message without id (method: notifications/message)'
        )
        expect(client.getState()).toBe('failed')

        const next = client.callTool('echo')
        await expect(next).rejects.toBeInstanceOf(ProtocolViolationError)
        await expect(next).rejects.toThrow(
            'MCP connection is out of sync: Expected a JSON-RPC response, got a message without id (method: notifications/message)'
        )
        expect(transport.methods).toEqual(['initialize', 'notifications/initialized', 'tools/call'])
    })

    it('fails queued calls behind a mismatched response', async () => {
        const transport = new FakeServerTransport(server({ 'tools/call': () => [resultLine('7', textResult('x'))] }))
        const client = await McpClient.connect(transport, options)

        const [first, second] = await Promise.allSettled([client.callTool('echo'), client.callTool('echo')])

        expect(first).toMatchObject({
            status: 'rejected',
            reason: { message: `Response id mismatch for 'tools/call': sent 2, received "7"` },
        })
        expect(second).toMatchObject({
            status: 'rejected',
            reason: { message: `MCP connection is out of sync: Response id mismatch for 'tools/call': sent 2, received "7"` },
        })
        expect(client.getState()).toBe('failed')
        expect(transport.methods.filter((m) => m === 'tools/call')).toHaveLength(1)
    })

    it('includes a stderr line in the empty-response error', async () => {
        const transport = new FakeServerTransport(server({ 'tools/call': () => [] }))
        const client = await McpClient.connect(transport, options)
        transport.stderrLines.push('sqlite: database is locked')

        await expect(client.callTool('echo')).rejects.toThrow(
            "Empty response from MCP server for 'tools/call'. Server stderr: sqlite: database is locked"
        )
    })

    it('reports a bare empty response when stderr is silent', async () => {
        const transport = new FakeServerTransport(server({ 'tools/call': () => [] }))
        const client = await McpClient.connect(transport, options)

        const call = client.callTool('echo')
        await expect(call).rejects.toBeInstanceOf(TransportError)
        await expect(call).rejects.toThrow(/^Empty response from MCP server for 'tools\/call'$/)
    })

    it('turns a JSON-RPC error into RpcError', async () => {
        const transport = new FakeServerTransport(server())
        const client = await McpClient.connect(transport, options)

        const call = client.callTool('missing_tool')
        await expect(call).rejects.toBeInstanceOf(RpcError)
        await expect(call).rejects.toThrow('tools/call failed (-32602): Unknown tool: missing_tool')
    })

    it('lists tools from the envelope and from a bare array', async () => {
        const descriptor = { name: 'list_tasks', description: 'List tasks', inputSchema: { type: 'object' } }
        const envelope = await McpClient.connect(
            new FakeServerTransport(taskServerHandler({ toolList: { tools: [descriptor] } })),
            options
        )
        const bare = await McpClient.connect(new FakeServerTransport(taskServerHandler({ toolList: [descriptor] })), options)

        expect(await envelope.listTools()).toEqual([descriptor])
        expect(await bare.listTools()).toEqual([descriptor])
    })

    it('rejects a tool list in neither shape', async () => {
        const client = await McpClient.connect(
            new FakeServerTransport(taskServerHandler({ toolList: { items: [] } })),
            options
        )
        await expect(client.listTools()).rejects.toBeInstanceOf(ProtocolViolationError)
    })
})

describe('McpClient teardown', () => {
    it('close terminates the transport and refuses further calls', async () => {
        const transport = new FakeServerTransport(server())
        const client = await McpClient.connect(transport, options)

        await client.close()

        expect(transport.closed).toBe(true)
        expect(client.getState()).toBe('closed')
        await expect(client.callTool('echo')).rejects.toThrow('MCP client is closed')
    })

    it('close fails a request that is waiting for its response', async () => {
        const transport = new GatedTransport(server())
        const client = new McpClient(transport, options)

        const handshake = client.initialize()
        await new Promise((resolve) => setImmediate(resolve))
        await client.close()

        await expect(handshake).rejects.toThrow("MCP client closed while waiting for 'initialize'")
    })

    it('dispose skips cleanup while a request holds the lock', async () => {
        const transport = new GatedTransport(server())
        const client = new McpClient(transport, options)

        const handshake = client.initialize()
        await new Promise((resolve) => setImmediate(resolve))
        client.dispose()

        expect(transport.closed).toBe(false)
        expect(client.getState()).toBe('initializing')

        transport.release(resultLine('1', { capabilities: {} }))
        await handshake
        expect(client.getState()).toBe('ready')

        client.dispose()
        expect(client.getState()).toBe('closed')
        await new Promise((resolve) => setImmediate(resolve))
        expect(transport.closed).toBe(true)
    })
})
