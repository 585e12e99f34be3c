import { TaskAnalyzer } from '../agents/analyzer.js'
import type { ResolvedConfig } from '../config/schema.js'
import { createLLMClient } from '../llm/client.js'
import type { LLMClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { McpClient } from '../mcp/client.js'
import { TaskService } from '../mcp/tasks.js'
import { type SpawnFn, StdioTransport, spawnWithExeca } from '../mcp/transport.js'
import { ToolBridge } from '../tools/bridge.js'
import { errorMessage } from './errors.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'
import { withRetry } from './retry.js'

const MAX_CONNECT_DELAY_MS = 30_000

/** One live MCP server connection and the services built on it. */
export interface McpSession {
    client: McpClient
    tasks: TaskService
    bridge: ToolBridge
}

export interface ContainerOverrides {
    logger?: Logger
    fs?: FileSystem
    llmClient?: LLMClient
    spawn?: SpawnFn
}

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    llmClient: LLMClient
    analyzer: TaskAnalyzer
    /** Spawns the server and completes the handshake, retrying transient failures. */
    connect(): Promise<McpSession>
    shutdown(): Promise<void>
    /** Synchronous teardown for process exit hooks. */
    dispose(): void
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter()
    const fs = overrides.fs ?? new NodeFileSystem()
    const llmClient = overrides.llmClient ?? createLLMClient(config, logger)
    const spawn = overrides.spawn ?? spawnWithExeca
    const analyzer = new TaskAnalyzer(
        llmClient,
        logger,
        { model: config.model, temperature: config.temperature, maxTokens: config.maxTokens },
        eventBus
    )
    const clients = new Set<McpClient>()

    async function openSession(): Promise<McpSession> {
        const { command, args, env, methods } = config.server
        const transport = StdioTransport.spawn({ command, args, env }, logger, spawn)
        try {
            const client = await McpClient.connect(transport, { logger, methods })
            clients.add(client)
            return { client, tasks: new TaskService(client, logger), bridge: new ToolBridge(client, logger) }
        } catch (error) {
            await transport.close()
            throw error
        }
    }

    return {
        config,
        logger,
        eventBus,
        fs,
        llmClient,
        analyzer,

        connect() {
            return withRetry(openSession, {
                maxRetries: config.maxRetries,
                baseDelay: config.retryDelay,
                maxDelay: MAX_CONNECT_DELAY_MS,
                onRetry: (error, attempt, delay) =>
                    logger.warn({ attempt, delay, error: errorMessage(error) }, 'mcp:connect-retry'),
            })
        },

        async shutdown() {
            const errors: string[] = []
            for (const client of clients) {
                try {
                    await client.close()
                } catch (error) {
                    errors.push(errorMessage(error))
                }
            }
            clients.clear()
            eventBus.removeAll()
            if (errors.length > 0) {
                logger.warn({ errors }, 'Errors during shutdown')
            }
        },

        dispose() {
            for (const client of clients) client.dispose()
            clients.clear()
        },
    }
}
