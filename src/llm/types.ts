export interface ToolCall {
    id: string
    type: 'function'
    function: {
        name: string
        arguments: string
    }
}

export type ChatMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string }
    | { role: 'assistant'; content: string | null; tool_calls?: ToolCall[] }
    | { role: 'tool'; content: string; tool_call_id: string }

export interface ToolDefinition {
    type: 'function'
    function: {
        name: string
        description: string
        parameters: Record<string, unknown>
    }
}

export type ToolChoice = 'auto' | 'none'

export interface ChatParams {
    model?: string
    messages: ChatMessage[]
    tools?: ToolDefinition[]
    toolChoice?: ToolChoice
    temperature?: number
    maxTokens?: number
    signal?: AbortSignal
}

export interface ChatResponse {
    content: string | null
    toolCalls: ToolCall[]
    finishReason: 'stop' | 'tool_calls' | 'length'
    usage: { promptTokens: number; completionTokens: number }
}

export interface LLMClient {
    chat(params: ChatParams): Promise<ChatResponse>
}
