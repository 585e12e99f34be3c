import { Command } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config } from '../config/schema.js'
import { type Container, type ContainerOverrides, type McpSession, createContainer } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { analyzeCommand } from './commands/analyze.js'
import { listCommand } from './commands/list.js'
import { statsCommand } from './commands/stats.js'
import { statusCommand } from './commands/status.js'
import { toolsCommand } from './commands/tools.js'
import { colors, formatError } from './ui.js'

interface GlobalOptions {
    server?: string
    serverArgs?: string
    model?: string
    key?: string
    baseUrl?: string
    verbose?: boolean
}

function toCliFlags(options: GlobalOptions): Config {
    const flags: Config = {
        model: options.model,
        apiKey: options.key,
        baseURL: options.baseUrl,
        logLevel: options.verbose ? 'debug' : undefined,
    }
    if (options.server !== undefined || options.serverArgs !== undefined) {
        flags.server = {
            command: options.server,
            args: options.serverArgs?.split(/\s+/).filter(Boolean),
        }
    }
    return flags
}

export function createProgram(overrides: ContainerOverrides = {}): Command {
    const program = new Command()

    program
        .name('taskbridge')
        .description('Query an MCP task server and analyze pending tasks with an LLM')
        .version('0.1.0')
        .option('--server <command>', 'MCP server command')
        .option('--server-args <args>', 'MCP server arguments (whitespace separated)')
        .option('-m, --model <model>', 'LLM model to use')
        .option('-k, --key <key>', 'API key for the chat completion endpoint')
        .option('--base-url <url>', 'Base URL of the chat completion endpoint')
        .option('-v, --verbose', 'Enable debug logging')

    /**
     * Loads config, opens one MCP session and always tears it down. Failures
     * are printed and turn into exit code 1.
     */
    async function runWithSession(run: (container: Container, session: McpSession) => Promise<void>): Promise<void> {
        let container: Container | undefined
        const onExit = () => container?.dispose()
        process.once('exit', onExit)
        try {
            const fs = overrides.fs ?? new NodeFileSystem()
            const config = await loadConfig({
                fs,
                cliFlags: toCliFlags(program.opts<GlobalOptions>()),
                onWarning: (message) => console.error(colors.warn(message)),
            })
            container = createContainer(config, { ...overrides, fs })
            container.logger.debug({ command: config.server.command, args: config.server.args }, 'cli:start')
            const session = await container.connect()
            await run(container, session)
        } catch (error) {
            container?.logger.error({ error: errorMessage(error) }, 'cli:failed')
            console.error(formatError(errorMessage(error)))
            process.exitCode = 1
        } finally {
            process.off('exit', onExit)
            await container?.shutdown()
        }
    }

    program
        .command('list')
        .description('List all tasks from the MCP server')
        .action(() => runWithSession((_, session) => listCommand(session)))

    program
        .command('tools')
        .description('List the tools the MCP server exposes')
        .action(() => runWithSession((_, session) => toolsCommand(session)))

    program
        .command('stats')
        .description('Show task statistics')
        .action(() => runWithSession((_, session) => statsCommand(session)))

    program
        .command('status <status>')
        .description('List tasks with a specific status (e.g. todo, in_progress, completed, pending)')
        .action((status: string) => runWithSession((_, session) => statusCommand(session, status)))

    program
        .command('analyze')
        .description('Analyze pending tasks with the LLM')
        .option('--no-tools', 'Single completion without MCP tool access')
        .option('-o, --output <file>', 'Save the report (.json, .md or .txt)')
        .action((options: { tools: boolean; output?: string }) =>
            runWithSession((container, session) => analyzeCommand(container, session, options))
        )

    return program
}
