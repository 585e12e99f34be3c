import { type ZodTypeAny, z } from 'zod'
import { zodToJsonSchema } from 'zod-to-json-schema'
import type { ToolDefinition } from '../llm/types.js'
import type { ToolDescriptor } from '../mcp/types.js'

/** Prefix that keeps server tool names apart from the built-in tools. */
export const SERVER_TOOL_PREFIX = 'mcp_'

const filter = (what: string) => z.string().optional().catch(undefined).describe(`Filter tasks by ${what}`)

export const ListTasksArgsSchema = z.object({
    assignee: filter('assignee'),
    priority: filter('priority'),
    status: filter('status'),
    tag: filter('tag'),
})

export const GetTaskArgsSchema = z.object({
    id: z.string().describe('The ID of the task to retrieve'),
})

export const TaskStatsArgsSchema = z.object({})

export const McpInvokeArgsSchema = z.object({
    server: z.string().optional().describe("MCP server alias (e.g. 'todo')"),
    tool: z.string().min(1).describe('Tool name on the MCP server to invoke'),
    arguments: z.record(z.unknown()).default({}).describe('Tool arguments as a JSON object'),
})

interface BuiltinTool {
    description: string
    parameters: ZodTypeAny
}

export const BUILTIN_TOOLS = {
    mcp_invoke: {
        description: 'Invoke any tool on the connected MCP server to fetch data, manage tasks, or perform actions',
        parameters: McpInvokeArgsSchema,
    },
    list_tasks: {
        description: 'List all tasks, optionally filtered by status, priority, assignee, or tag',
        parameters: ListTasksArgsSchema,
    },
    get_task: {
        description: 'Get detailed information about a specific task by ID',
        parameters: GetTaskArgsSchema,
    },
    task_stats: {
        description: 'Get statistics about tasks (counts by status, priority, etc.)',
        parameters: TaskStatsArgsSchema,
    },
} satisfies Record<string, BuiltinTool>

export type BuiltinToolName = keyof typeof BUILTIN_TOOLS

const TASK_TOOL_NAMES = ['list_tasks', 'get_task', 'task_stats'] as const satisfies readonly BuiltinToolName[]

export function isBuiltinToolName(name: string): name is BuiltinToolName {
    return Object.hasOwn(BUILTIN_TOOLS, name)
}

export type ToolTarget =
    | { kind: 'builtin'; tool: BuiltinToolName }
    | { kind: 'server'; toolName: string }
    | { kind: 'unknown'; name: string }

/** Exact built-in names win over the prefixed form, so `mcp_invoke` is never forwarded as `invoke`. */
export function resolveToolTarget(name: string): ToolTarget {
    if (isBuiltinToolName(name)) return { kind: 'builtin', tool: name }
    if (name.startsWith(SERVER_TOOL_PREFIX) && name.length > SERVER_TOOL_PREFIX.length) {
        return { kind: 'server', toolName: name.slice(SERVER_TOOL_PREFIX.length) }
    }
    return { kind: 'unknown', name }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Anything other than an object schema is replaced by an empty object schema. */
export function normalizeSchema(schema: unknown): Record<string, unknown> {
    if (isPlainObject(schema) && (schema.type === undefined || schema.type === 'object')) {
        return schema
    }
    return { type: 'object', properties: {}, required: [] }
}

export function toProviderTool(descriptor: ToolDescriptor): ToolDefinition {
    return {
        type: 'function',
        function: {
            name: `${SERVER_TOOL_PREFIX}${descriptor.name}`,
            description: descriptor.description ?? `Invoke ${descriptor.name} tool from MCP server`,
            parameters: normalizeSchema(descriptor.inputSchema),
        },
    }
}

function builtinDefinition(name: BuiltinToolName): ToolDefinition {
    const tool: BuiltinTool = BUILTIN_TOOLS[name]
    return {
        type: 'function',
        function: {
            name,
            description: tool.description,
            parameters: zodToJsonSchema(tool.parameters) as Record<string, unknown>,
        },
    }
}

/**
 * Catalog order: `mcp_invoke`, the server's tools in the order it listed them,
 * then the task tools.
 */
export function buildToolCatalog(descriptors: ToolDescriptor[]): ToolDefinition[] {
    return [
        builtinDefinition('mcp_invoke'),
        ...descriptors.map(toProviderTool),
        ...TASK_TOOL_NAMES.map(builtinDefinition),
    ]
}
