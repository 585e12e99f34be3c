import { describe, it, expect } from 'vitest'
import { RpcError, TransportError } from '../../../src/core/errors.js'
import { McpClient } from '../../../src/mcp/client.js'
import { ToolBridge, parseArguments, shapeToolResult } from '../../../src/tools/bridge.js'
import { FakeServerTransport, taskServerHandler, textResult } from '../../helpers/fake-mcp-server.js'
import { silentLogger } from '../../helpers/logger.js'
import { StubToolCaller, jsonResult } from '../../helpers/stub-tool-caller.js'

function bridgeWith(caller: StubToolCaller): ToolBridge {
    return new ToolBridge(caller, silentLogger)
}

describe('parseArguments', () => {
    it('returns JSON objects as-is', () => {
        expect(parseArguments('{"status":"pending"}')).toEqual({ status: 'pending' })
    })

    it('falls back to an empty object', () => {
        expect(parseArguments('{not json')).toEqual({})
        expect(parseArguments('[1,2]')).toEqual({})
        expect(parseArguments('null')).toEqual({})
        expect(parseArguments('')).toEqual({})
    })
})

describe('shapeToolResult', () => {
    it('unwraps a single JSON text block', () => {
        expect(shapeToolResult('task_stats', jsonResult({ total: 4 }))).toEqual({
            tool_name: 'task_stats',
            success: true,
            content: { total: 4 },
        })
    })

    it('keeps plain text as a text block', () => {
        const payload = shapeToolResult('get_task', { content: [{ type: 'text', text: 'Task not found' }] })
        expect(payload.content).toEqual({ type: 'text', text: 'Task not found' })
    })

    it('returns several blocks as an array', () => {
        const payload = shapeToolResult('export', {
            content: [
                { type: 'text', text: '{"a":1}' },
                { type: 'image', data: 'AAAA', mimeType: 'image/png' },
                { type: 'resource_link', uri: 'file:///tmp/tasks.csv' },
            ],
        })

        expect(payload.content).toEqual([
            { a: 1 },
            { type: 'image', data: 'AAAA', mime_type: 'image/png' },
            { type: 'resource_link', uri: 'file:///tmp/tasks.csv' },
        ])
    })

    it('leaves content out when the result has none', () => {
        expect(shapeToolResult('task_stats', { content: [] })).toEqual({ tool_name: 'task_stats', success: true })
    })

    it('marks a result the server flagged as an error', () => {
        const payload = shapeToolResult('list_tasks', { content: [{ type: 'text', text: 'boom' }], isError: true })

        expect(payload).toEqual({
            tool_name: 'list_tasks',
            success: false,
            content: { type: 'text', text: 'boom' },
            error: 'Tool execution reported an error',
        })
    })
})

describe('ToolBridge', () => {
    it('builds the catalog from the server tool list', async () => {
        const caller = new StubToolCaller([{ name: 'create_task', inputSchema: { type: 'object' } }])

        const catalog = await bridgeWith(caller).buildCatalog()

        expect(catalog.map((tool) => tool.function.name)).toEqual([
            'mcp_invoke',
            'mcp_create_task',
            'list_tasks',
            'get_task',
            'task_stats',
        ])
    })

    it('forwards prefixed tools under their server name', async () => {
        const caller = new StubToolCaller().returnsJson('create_task', { id: 9 })

        const payload = await bridgeWith(caller).execute('mcp_create_task', '{"title":"Water plants"}')

        expect(caller.calls).toEqual([{ name: 'create_task', args: { title: 'Water plants' } }])
        expect(payload).toEqual({ tool_name: 'create_task', success: true, content: { id: 9 } })
    })

    it('sends empty arguments when the model sends unparsable ones', async () => {
        const caller = new StubToolCaller().returnsJson('create_task', { id: 9 })

        await bridgeWith(caller).execute('mcp_create_task', '{"title": ')

        expect(caller.calls[0]?.args).toEqual({})
    })

    it('forwards only string filters for list_tasks', async () => {
        const caller = new StubToolCaller().returnsJson('list_tasks', [])

        await bridgeWith(caller).execute('list_tasks', JSON.stringify({ status: 'pending', priority: 3, tag: 'home' }))

        expect(caller.calls[0]?.args).toEqual({ status: 'pending', tag: 'home' })
    })

    it('forwards the id for get_task', async () => {
        const caller = new StubToolCaller().returnsJson('get_task', { id: '12' })

        await bridgeWith(caller).execute('get_task', '{"id":"12","verbose":true}')

        expect(caller.calls).toEqual([{ name: 'get_task', args: { id: '12' } }])
    })

    it('reports a get_task call without an id', async () => {
        const caller = new StubToolCaller()

        const payload = await bridgeWith(caller).execute('get_task', '{}')

        expect(payload).toEqual({
            tool_name: 'get_task',
            success: false,
            error: 'Invalid arguments for get_task: id: Required',
        })
        expect(caller.calls).toEqual([])
    })

    it('calls task_stats without arguments', async () => {
        const caller = new StubToolCaller().returnsJson('task_stats', { total: 0 })

        await bridgeWith(caller).execute('task_stats', '{"group_by":"status"}')

        expect(caller.calls).toEqual([{ name: 'task_stats', args: {} }])
    })

    it('invokes the named tool through mcp_invoke', async () => {
        const caller = new StubToolCaller().returnsJson('complete_task', { ok: true })

        const payload = await bridgeWith(caller).execute(
            'mcp_invoke',
            JSON.stringify({ server: 'todo', tool: 'complete_task', arguments: { id: '4' } })
        )

        expect(caller.calls).toEqual([{ name: 'complete_task', args: { id: '4' } }])
        expect(payload).toEqual({ tool_name: 'complete_task', success: true, content: { ok: true } })
    })

    it('defaults mcp_invoke arguments to an empty object', async () => {
        const caller = new StubToolCaller().returnsJson('task_stats', {})

        await bridgeWith(caller).execute('mcp_invoke', '{"tool":"task_stats"}')

        expect(caller.calls).toEqual([{ name: 'task_stats', args: {} }])
    })

    it('reports an mcp_invoke call without a tool name', async () => {
        const payload = await bridgeWith(new StubToolCaller()).execute('mcp_invoke', '{"arguments":{}}')

        expect(payload).toEqual({
            tool_name: 'mcp_invoke',
            success: false,
            error: 'Invalid arguments for mcp_invoke: tool: Required',
        })
    })

    it('reports unknown tools without calling the server', async () => {
        const caller = new StubToolCaller()

        const payload = await bridgeWith(caller).execute('delete_everything', '{}')

        expect(payload).toEqual({ tool_name: 'delete_everything', success: false, error: 'Unknown tool: delete_everything' })
        expect(caller.calls).toEqual([])
    })

    it('turns a JSON-RPC error into a failed payload', async () => {
        const caller = new StubToolCaller().on('archive', () => {
            throw new RpcError(-32602, 'tools/call failed (-32602): Unknown tool: archive')
        })

        const payload = await bridgeWith(caller).execute('mcp_archive', '{}')

        expect(payload).toEqual({
            tool_name: 'mcp_archive',
            success: false,
            error: 'tools/call failed (-32602): Unknown tool: archive',
        })
    })

    it('reports a result with an unknown content block as a failed call and keeps the connection', async () => {
        const transport = new FakeServerTransport(
            taskServerHandler({
                tools: {
                    chart_tasks: () => ({ content: [{ type: 'chart' }] }),
                    task_stats: () => textResult({ total: 2 }),
                },
            })
        )
        const client = await McpClient.connect(transport, { logger: silentLogger, stderrPeekMs: 5 })
        const bridge = new ToolBridge(client, silentLogger)

        const failed = await bridge.execute('mcp_chart_tasks', '{}')
        const next = await bridge.execute('task_stats', '{}')

        expect(failed).toEqual({
            tool_name: 'mcp_chart_tasks',
            success: false,
            error: expect.stringContaining("Invalid result for tool 'chart_tasks': content.0.type"),
        })
        expect(next).toEqual({ tool_name: 'task_stats', success: true, content: { total: 2 } })
        expect(client.getState()).toBe('ready')
    })

    it('rethrows a broken connection', async () => {
        const caller = new StubToolCaller().on('list_tasks', () => {
            throw new TransportError('MCP transport is closed')
        })

        await expect(bridgeWith(caller).execute('list_tasks', '{}')).rejects.toBeInstanceOf(TransportError)
    })
})
