import type { ChatParams, ChatResponse, LLMClient, ToolCall } from '../../src/llm/types.js'

export interface ScriptedResponse {
    content: string | null
    toolCalls?: ToolCall[]
    finishReason?: 'stop' | 'tool_calls' | 'length'
    usage?: { promptTokens: number; completionTokens: number }
}

export interface CapturedCall {
    params: ChatParams
    /** Copy of the message history at call time; `params.messages` keeps growing afterwards. */
    messages: ChatParams['messages']
}

export class ScriptedLLMClient implements LLMClient {
    readonly capturedCalls: CapturedCall[] = []
    private callIndex = 0

    constructor(private responses: ScriptedResponse[]) {}

    async chat(params: ChatParams): Promise<ChatResponse> {
        this.capturedCalls.push({ params, messages: [...params.messages] })

        const scripted = this.responses[this.callIndex++]
        if (!scripted) {
            throw new Error(
                `ScriptedLLMClient: no more responses (called ${this.callIndex} times, only ${this.responses.length} scripted)`
            )
        }

        return {
            content: scripted.content,
            toolCalls: scripted.toolCalls ?? [],
            finishReason: scripted.finishReason ?? (scripted.toolCalls?.length ? 'tool_calls' : 'stop'),
            usage: scripted.usage ?? { promptTokens: 10, completionTokens: 10 },
        }
    }

    // --- Factory methods ---

    static fromStrings(strings: string[]): ScriptedLLMClient {
        return new ScriptedLLMClient(strings.map((s) => ({ content: s, finishReason: 'stop' as const })))
    }

    static withToolCalls(calls: ToolCall[], finalContent: string): ScriptedLLMClient {
        return new ScriptedLLMClient([
            { content: null, toolCalls: calls, finishReason: 'tool_calls' },
            { content: finalContent, finishReason: 'stop' },
        ])
    }

    /** Every response asks for the same tool again. */
    static alwaysCalling(call: () => ToolCall, times: number): ScriptedLLMClient {
        return new ScriptedLLMClient(
            Array.from({ length: times }, () => ({ content: null, toolCalls: [call()], finishReason: 'tool_calls' as const }))
        )
    }

    // --- Assertion helpers ---

    getCall(index: number): CapturedCall {
        const call = this.capturedCalls[index]
        if (!call) {
            throw new Error(
                `ScriptedLLMClient: no call at index ${index} (only ${this.capturedCalls.length} calls captured)`
            )
        }
        return call
    }

    toolNamesAt(index: number): string[] {
        return (this.getCall(index).params.tools ?? []).map((t) => t.function.name)
    }

    get totalCalls(): number {
        return this.capturedCalls.length
    }
}

let callCounter = 0

export function makeToolCall(name: string, args: Record<string, unknown> | string = {}): ToolCall {
    callCounter++
    return {
        id: `call_${callCounter}`,
        type: 'function',
        function: { name, arguments: typeof args === 'string' ? args : JSON.stringify(args) },
    }
}

export function makeToolCallResponse(toolCalls: ToolCall[], content?: string): ScriptedResponse {
    return {
        content: content ?? null,
        toolCalls,
        finishReason: 'tool_calls',
    }
}
