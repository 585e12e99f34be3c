import path from 'node:path'
import { ConfigError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LOG_LEVELS, type ResolvedConfig } from './schema.js'
import { z } from 'zod'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Config
    projectDir?: string
    onWarning?: (message: string) => void
}

async function loadJsonConfig(fs: FileSystem, filePath: string, onWarning?: (message: string) => void): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON<unknown>(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch (error) {
        onWarning?.(`Ignoring invalid config file ${filePath}: ${errorMessage(error)}`)
    }
    return {}
}

/** Reads a numeric env var and applies the same bounds a config file gets. */
function readNumberEnv(name: string, schema: z.ZodType<number | undefined>): number | undefined {
    const raw = process.env[name]
    if (raw === undefined || raw.trim() === '') return undefined
    const value = Number(raw)
    if (!Number.isFinite(value)) {
        throw new ConfigError(`${name} must be a valid number`)
    }
    const checked = schema.safeParse(value)
    if (!checked.success) {
        throw new ConfigError(`Invalid ${name}: ${checked.error.issues.map((issue) => issue.message).join('; ')}`)
    }
    return checked.data
}

function readEnvConfig(): Config {
    const env = process.env
    const envConfig: Config = {}

    if (env.TASKBRIDGE_SERVER_COMMAND !== undefined || env.TASKBRIDGE_SERVER_ARGS !== undefined) {
        envConfig.server = {
            command: env.TASKBRIDGE_SERVER_COMMAND,
            args: env.TASKBRIDGE_SERVER_ARGS?.split(/\s+/).filter(Boolean),
        }
    }
    if (env.TASKBRIDGE_API_KEY) envConfig.apiKey = env.TASKBRIDGE_API_KEY
    if (env.TASKBRIDGE_MODEL) envConfig.model = env.TASKBRIDGE_MODEL
    if (env.TASKBRIDGE_BASE_URL) envConfig.baseURL = env.TASKBRIDGE_BASE_URL
    if (env.TASKBRIDGE_LOG_LEVEL) {
        const level = z.enum(LOG_LEVELS).safeParse(env.TASKBRIDGE_LOG_LEVEL)
        if (!level.success) {
            throw new ConfigError(`TASKBRIDGE_LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`)
        }
        envConfig.logLevel = level.data
    }

    envConfig.requestTimeout = readNumberEnv('TASKBRIDGE_REQUEST_TIMEOUT', ConfigSchema.shape.requestTimeout)
    envConfig.maxRetries = readNumberEnv('TASKBRIDGE_MAX_RETRIES', ConfigSchema.shape.maxRetries)
    envConfig.retryDelay = readNumberEnv('TASKBRIDGE_RETRY_DELAY', ConfigSchema.shape.retryDelay)

    return envConfig
}

function mergeConfigs(...configs: Config[]): Config {
    let merged: Config = {}
    for (const cfg of configs) {
        merged = {
            server: mergeServer(merged.server, cfg.server),
            model: cfg.model ?? merged.model,
            apiKey: cfg.apiKey ?? merged.apiKey,
            baseURL: cfg.baseURL ?? merged.baseURL,
            temperature: cfg.temperature ?? merged.temperature,
            maxTokens: cfg.maxTokens ?? merged.maxTokens,
            logLevel: cfg.logLevel ?? merged.logLevel,
            requestTimeout: cfg.requestTimeout ?? merged.requestTimeout,
            maxRetries: cfg.maxRetries ?? merged.maxRetries,
            retryDelay: cfg.retryDelay ?? merged.retryDelay,
        }
    }
    return merged
}

function mergeServer(base: Config['server'], next: Config['server']): Config['server'] {
    if (!next) return base
    return {
        command: next.command ?? base?.command,
        args: next.args ?? base?.args,
        env: next.env ? { ...base?.env, ...next.env } : base?.env,
        methods: next.methods ? { ...base?.methods, ...next.methods } : base?.methods,
    }
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), onWarning } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE, onWarning)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE), onWarning)

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, readEnvConfig(), cliFlags)

    const server = merged.server
    const command = server?.command ?? DEFAULT_CONFIG.server.command
    if (command.trim() === '') {
        throw new ConfigError('MCP server command cannot be empty')
    }

    const resolved: ResolvedConfig = {
        model: merged.model ?? DEFAULT_CONFIG.model,
        apiKey: merged.apiKey ?? DEFAULT_CONFIG.apiKey,
        baseURL: merged.baseURL ?? DEFAULT_CONFIG.baseURL,
        temperature: merged.temperature ?? DEFAULT_CONFIG.temperature,
        maxTokens: merged.maxTokens ?? DEFAULT_CONFIG.maxTokens,
        logLevel: merged.logLevel ?? DEFAULT_CONFIG.logLevel,
        requestTimeout: merged.requestTimeout ?? DEFAULT_CONFIG.requestTimeout,
        maxRetries: merged.maxRetries ?? DEFAULT_CONFIG.maxRetries,
        retryDelay: merged.retryDelay ?? DEFAULT_CONFIG.retryDelay,
        server: {
            command,
            args: server?.args ?? DEFAULT_CONFIG.server.args,
            env: { ...DEFAULT_CONFIG.server.env, ...server?.env },
            methods: { ...DEFAULT_CONFIG.server.methods, ...server?.methods },
        },
        projectDir,
        configDir: CONFIG_DIR,
    }

    return resolved
}
