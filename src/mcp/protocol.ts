import { z } from 'zod'
import { ParseError, ProtocolViolationError, ToolExecutionError } from '../core/errors.js'
import type { Result } from '../core/result.js'
import { err, ok } from '../core/result.js'
import type { ContentBlock, ToolCallResult, ToolDescriptor } from './types.js'

export const JSONRPC_VERSION = '2.0'

export interface JsonRpcRequest {
    jsonrpc: typeof JSONRPC_VERSION
    id: string
    method: string
    params?: Record<string, unknown>
}

export interface JsonRpcNotification {
    jsonrpc: typeof JSONRPC_VERSION
    method: string
    params?: Record<string, unknown>
}

export interface JsonRpcErrorObject {
    code: number
    message: string
    data?: unknown
}

export type JsonRpcResponse =
    | { id: string | number | null; result: unknown }
    | { id: string | number | null; error: JsonRpcErrorObject }

const JsonRpcErrorObjectSchema = z.object({
    code: z.number(),
    message: z.string(),
    data: z.unknown().optional(),
})

const JsonRpcEnvelopeSchema = z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: z.union([z.string(), z.number(), z.null()]),
    error: JsonRpcErrorObjectSchema.optional(),
})

export function encodeFrame(frame: JsonRpcRequest | JsonRpcNotification): string {
    return JSON.stringify(frame)
}

/** Decodes one stdout line into a response envelope. */
export function decodeResponse(line: string): JsonRpcResponse {
    let raw: unknown
    try {
        raw = JSON.parse(line)
    } catch (error) {
        throw new ParseError(`Malformed JSON from MCP server: ${line}`, line, { cause: error })
    }

    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new ProtocolViolationError(`Expected a JSON-RPC response object, got: ${line}`)
    }
    if (!('id' in raw)) {
        const method = 'method' in raw && typeof raw.method === 'string' ? raw.method : 'unknown'
        throw new ProtocolViolationError(`Expected a JSON-RPC response, got a message without id (method: ${method})`)
    }

    const envelope = JsonRpcEnvelopeSchema.safeParse(raw)
    if (!envelope.success) {
        throw new ProtocolViolationError(`Invalid JSON-RPC response envelope: ${envelope.error.message}`)
    }

    const { id, error } = envelope.data
    if (error) return { id, error }
    if (!('result' in raw)) {
        throw new ProtocolViolationError(`JSON-RPC response ${String(id)} has neither result nor error`)
    }
    return { id, result: raw.result }
}

const ContentBlockSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('text'), text: z.string() }),
    z.object({ type: z.literal('image'), data: z.string(), mimeType: z.string() }),
    z.object({ type: z.literal('audio'), data: z.string(), mimeType: z.string() }),
    z.object({ type: z.literal('resource'), resource: z.record(z.unknown()) }),
    z.object({ type: z.literal('resource_link'), uri: z.string(), name: z.string().optional() }),
])

const CallToolResultSchema = z.object({
    content: z.array(ContentBlockSchema).default([]),
    isError: z.boolean().optional(),
    structuredContent: z.record(z.unknown()).optional(),
})

/**
 * Validates a tool call result. A result that does not fit the schema is the
 * tool's failure, not the connection's: the response itself was well formed.
 */
export function parseCallToolResult(toolName: string, value: unknown): ToolCallResult {
    const parsed = CallToolResultSchema.safeParse(value)
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'result'}: ${issue.message}`)
        throw new ToolExecutionError(`Invalid result for tool '${toolName}': ${issues.join('; ')}`)
    }
    const content: ContentBlock[] = parsed.data.content
    return { ...parsed.data, content }
}

const ToolDescriptorSchema = z
    .object({
        name: z.string().min(1),
        description: z.string().nullish(),
        inputSchema: z.unknown().optional(),
        input_schema: z.unknown().optional(),
    })
    .transform(
        (tool): ToolDescriptor => ({
            name: tool.name,
            description: tool.description ?? undefined,
            inputSchema: tool.inputSchema ?? tool.input_schema,
        })
    )

const ToolListEnvelopeSchema = z.object({ tools: z.array(ToolDescriptorSchema) })
const ToolArraySchema = z.array(ToolDescriptorSchema)

/**
 * Servers answer tools/list either with the `{ tools: [...] }` envelope or with
 * a bare array. The envelope is tried first, the bare array second.
 */
export function parseToolList(value: unknown): Result<ToolDescriptor[]> {
    const envelope = ToolListEnvelopeSchema.safeParse(value)
    if (envelope.success) return ok(envelope.data.tools)

    const bare = ToolArraySchema.safeParse(value)
    if (bare.success) return ok(bare.data)

    return err(`Tool list is neither a { tools } envelope nor an array: ${bare.error.message}`)
}
