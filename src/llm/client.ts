import OpenAI from 'openai'
import type { ResolvedConfig } from '../config/schema.js'
import { EndpointError, errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { ChatMessage, ChatParams, ChatResponse, LLMClient, ToolCall } from './types.js'

/** The slice of the SDK's chat completions resource the client calls. */
export interface CompletionsEndpoint {
    create(
        body: OpenAI.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
    ): Promise<OpenAI.ChatCompletion>
}

type LLMClientConfig = Pick<
    ResolvedConfig,
    'apiKey' | 'baseURL' | 'model' | 'temperature' | 'maxTokens' | 'requestTimeout'
>

export function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content }
        case 'user':
            return { role: 'user', content: message.content }
        case 'assistant':
            if (message.tool_calls && message.tool_calls.length > 0) {
                return { role: 'assistant', content: message.content, tool_calls: message.tool_calls }
            }
            return { role: 'assistant', content: message.content }
        case 'tool':
            return { role: 'tool', content: message.content, tool_call_id: message.tool_call_id }
    }
}

function toEndpointError(error: unknown): EndpointError {
    if (error instanceof EndpointError) return error
    if (error instanceof OpenAI.APIError) {
        return new EndpointError(`Chat completion request failed: ${error.message}`, error.status, { cause: error })
    }
    return new EndpointError(`Chat completion request failed: ${errorMessage(error)}`, undefined, { cause: error })
}

/**
 * Chat completion client for any OpenAI-compatible endpoint. The SDK's own
 * retries are disabled: a failed request surfaces as an EndpointError and
 * retrying is left to the command that made it.
 */
export function createLLMClient(
    config: LLMClientConfig,
    logger: Logger,
    completions?: CompletionsEndpoint
): LLMClient {
    let endpoint = completions
    // The SDK client is built on first use so commands that never reach the model need no API key.
    const getEndpoint = (): CompletionsEndpoint =>
        (endpoint ??= new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.baseURL,
            maxRetries: 0,
            timeout: config.requestTimeout * 1000,
        }).chat.completions)

    return {
        async chat(params: ChatParams): Promise<ChatResponse> {
            const model = params.model ?? config.model
            const tools = params.tools && params.tools.length > 0 ? params.tools : undefined
            logger.debug({ model, messages: params.messages.length, tools: tools?.length ?? 0 }, 'llm:request')

            let response: OpenAI.ChatCompletion
            try {
                response = await getEndpoint().create(
                    {
                        model,
                        messages: params.messages.map(toOpenAIMessage),
                        tools,
                        tool_choice: tools ? params.toolChoice : undefined,
                        temperature: params.temperature ?? config.temperature,
                        max_tokens: params.maxTokens ?? config.maxTokens,
                    },
                    { signal: params.signal }
                )
            } catch (error) {
                throw toEndpointError(error)
            }

            const choice = response.choices[0]
            if (!choice) throw new EndpointError('No choices returned from chat completion endpoint', 200)

            const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map((tc) => ({
                id: tc.id,
                type: 'function' as const,
                function: {
                    name: tc.function.name,
                    arguments: tc.function.arguments,
                },
            }))

            let finishReason: ChatResponse['finishReason'] = 'stop'
            if (choice.finish_reason === 'tool_calls') finishReason = 'tool_calls'
            else if (choice.finish_reason === 'length') finishReason = 'length'
            else if (toolCalls.length > 0) finishReason = 'tool_calls'

            const result: ChatResponse = {
                content: choice.message.content,
                toolCalls,
                finishReason,
                usage: {
                    promptTokens: response.usage?.prompt_tokens ?? 0,
                    completionTokens: response.usage?.completion_tokens ?? 0,
                },
            }

            logger.debug({ model, usage: result.usage, finishReason }, 'llm:response')
            return result
        },
    }
}
