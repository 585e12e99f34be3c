import type { TypedEventEmitter } from '../core/events.js'
import type { ChatMessage, LLMClient, ToolDefinition } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import { type ToolResultPayload, parseArguments } from '../tools/bridge.js'

export const MAX_TOOL_ITERATIONS = 5

export const ITERATION_LIMIT_MESSAGE = 'Analysis completed with maximum tool call iterations reached.'

/** Executes one model tool call; implemented by ToolBridge. */
export interface ToolDispatcher {
    execute(name: string, rawArguments: string): Promise<ToolResultPayload>
}

export interface OrchestratorOptions {
    model?: string
    temperature: number
    maxTokens: number
    maxIterations?: number
}

export interface ConversationRequest {
    systemPrompt: string
    userMessage: string
    tools: ToolDefinition[]
}

export interface ConversationResult {
    content: string
    toolCallCount: number
    iterations: number
    /** True when every iteration ended in tool calls and the fallback message was returned. */
    limitReached: boolean
    messages: ChatMessage[]
}

/**
 * Drives a bounded tool-calling exchange: each iteration sends the whole
 * history plus the tool catalog, executes any tool calls in the order the
 * model returned them and feeds the results back. The first response
 * without tool calls ends the conversation.
 */
export class ConversationOrchestrator {
    private readonly maxIterations: number

    constructor(
        private llmClient: LLMClient,
        private tools: ToolDispatcher,
        private logger: Logger,
        private options: OrchestratorOptions,
        private eventBus?: TypedEventEmitter
    ) {
        this.maxIterations = options.maxIterations ?? MAX_TOOL_ITERATIONS
    }

    async run(request: ConversationRequest): Promise<ConversationResult> {
        const messages: ChatMessage[] = [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.userMessage },
        ]
        let toolCallCount = 0

        for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
            this.eventBus?.emit('conversation:iteration', { iteration, maxIterations: this.maxIterations })

            const response = await this.llmClient.chat({
                model: this.options.model,
                messages,
                tools: request.tools,
                toolChoice: 'auto',
                temperature: this.options.temperature,
                maxTokens: this.options.maxTokens,
            })

            if (response.toolCalls.length === 0) {
                const content = response.content ?? ''
                messages.push({ role: 'assistant', content })
                this.logger.info({ iterations: iteration, toolCallCount }, 'conversation:complete')
                return { content, toolCallCount, iterations: iteration, limitReached: false, messages }
            }

            messages.push({ role: 'assistant', content: response.content, tool_calls: response.toolCalls })

            for (const call of response.toolCalls) {
                const toolName = call.function.name
                this.eventBus?.emit('tool:before', {
                    toolName,
                    callId: call.id,
                    args: parseArguments(call.function.arguments),
                })

                const start = Date.now()
                const result = await this.tools.execute(toolName, call.function.arguments)

                this.eventBus?.emit('tool:after', {
                    toolName,
                    callId: call.id,
                    duration: Date.now() - start,
                    success: result.success,
                })

                messages.push({ role: 'tool', tool_call_id: call.id, content: JSON.stringify(result) })
                toolCallCount++
            }

            this.logger.debug({ iteration, calls: response.toolCalls.length }, 'conversation:tool-calls')
        }

        this.logger.warn({ maxIterations: this.maxIterations, toolCallCount }, 'conversation:iteration-limit')
        return {
            content: ITERATION_LIMIT_MESSAGE,
            toolCallCount,
            iterations: this.maxIterations,
            limitReached: true,
            messages,
        }
    }
}
