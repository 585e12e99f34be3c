import type { z } from 'zod'
import { ToolExecutionError, ToolNotFoundError, errorMessage, isFatalConnectionError } from '../core/errors.js'
import type { ToolDefinition } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import type { ContentBlock, ToolCallResult, ToolCaller } from '../mcp/types.js'
import {
    type BuiltinToolName,
    GetTaskArgsSchema,
    ListTasksArgsSchema,
    McpInvokeArgsSchema,
    buildToolCatalog,
    isPlainObject,
    resolveToolTarget,
} from './catalog.js'

export interface ToolResultPayload {
    content?: unknown
    tool_name: string
    success: boolean
    error?: string
}

/** Tool-call arguments arrive as a JSON string; anything that is not a JSON object becomes `{}`. */
export function parseArguments(raw: string): Record<string, unknown> {
    let value: unknown
    try {
        value = JSON.parse(raw)
    } catch {
        return {}
    }
    return isPlainObject(value) ? value : {}
}

export function shapeContentBlock(block: ContentBlock): unknown {
    switch (block.type) {
        case 'text':
            try {
                return JSON.parse(block.text)
            } catch {
                return { type: 'text', text: block.text }
            }
        case 'image':
        case 'audio':
            return { type: block.type, data: block.data, mime_type: block.mimeType }
        case 'resource':
            return { type: 'resource', resource: block.resource }
        case 'resource_link':
            return block.name === undefined
                ? { type: 'resource_link', uri: block.uri }
                : { type: 'resource_link', uri: block.uri, name: block.name }
    }
}

/**
 * Flattens a tool result into the object handed back to the model: a single
 * block becomes `content` itself, several become an array, none leaves it out.
 */
export function shapeToolResult(toolName: string, result: ToolCallResult): ToolResultPayload {
    const blocks = result.content.map(shapeContentBlock)
    const payload: ToolResultPayload = { tool_name: toolName, success: true }
    if (blocks.length === 1) payload.content = blocks[0]
    else if (blocks.length > 1) payload.content = blocks

    if (result.isError) {
        payload.success = false
        payload.error = 'Tool execution reported an error'
    }
    return payload
}

function parseToolArgs<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    toolName: string,
    args: Record<string, unknown>
): T {
    const parsed = schema.safeParse(args)
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
        throw new ToolExecutionError(`Invalid arguments for ${toolName}: ${issues.join('; ')}`)
    }
    return parsed.data
}

/**
 * Routes model tool calls to the MCP server. Failures the conversation can
 * recover from come back as `success: false` payloads; a broken connection
 * is rethrown.
 */
export class ToolBridge {
    constructor(
        private client: ToolCaller,
        private logger: Logger
    ) {}

    async buildCatalog(): Promise<ToolDefinition[]> {
        const descriptors = await this.client.listTools()
        const catalog = buildToolCatalog(descriptors)
        this.logger.info({ serverTools: descriptors.length, total: catalog.length }, 'tools:catalog')
        return catalog
    }

    async execute(name: string, rawArguments: string): Promise<ToolResultPayload> {
        const args = parseArguments(rawArguments)
        try {
            return await this.dispatch(name, args)
        } catch (error) {
            if (isFatalConnectionError(error)) throw error
            this.logger.warn({ tool: name, error: errorMessage(error) }, 'tools:failed')
            return { tool_name: name, success: false, error: errorMessage(error) }
        }
    }

    private dispatch(name: string, args: Record<string, unknown>): Promise<ToolResultPayload> {
        const target = resolveToolTarget(name)
        switch (target.kind) {
            case 'builtin':
                return this.executeBuiltin(target.tool, args)
            case 'server':
                return this.invoke(target.toolName, args)
            case 'unknown':
                throw new ToolNotFoundError(target.name)
        }
    }

    private executeBuiltin(tool: BuiltinToolName, args: Record<string, unknown>): Promise<ToolResultPayload> {
        switch (tool) {
            case 'mcp_invoke': {
                const invocation = parseToolArgs(McpInvokeArgsSchema, tool, args)
                this.logger.debug({ server: invocation.server, tool: invocation.tool }, 'tools:mcp-invoke')
                return this.invoke(invocation.tool, invocation.arguments)
            }
            case 'list_tasks': {
                const filters = parseToolArgs(ListTasksArgsSchema, tool, args)
                const forwarded: Record<string, string> = {}
                for (const [key, value] of Object.entries(filters)) {
                    if (typeof value === 'string') forwarded[key] = value
                }
                return this.invoke('list_tasks', forwarded)
            }
            case 'get_task': {
                const { id } = parseToolArgs(GetTaskArgsSchema, tool, args)
                return this.invoke('get_task', { id })
            }
            case 'task_stats':
                return this.invoke('task_stats', {})
        }
    }

    private async invoke(toolName: string, args: Record<string, unknown>): Promise<ToolResultPayload> {
        this.logger.debug({ tool: toolName, args }, 'tools:invoke')
        const result = await this.client.callTool(toolName, args)
        return shapeToolResult(toolName, result)
    }
}
