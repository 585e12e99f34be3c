import { z } from 'zod'

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export const ProtocolMethodsSchema = z.object({
    initialize: z.string().min(1).optional(),
    initialized: z.string().min(1).optional(),
    callTool: z.string().min(1).optional(),
    listTools: z.string().min(1).optional(),
})

export const ServerSchema = z.object({
    command: z.string().optional(),
    args: z.array(z.string()).optional(),
    env: z.record(z.string()).optional(),
    methods: ProtocolMethodsSchema.optional(),
})

export const ConfigSchema = z.object({
    server: ServerSchema.optional(),
    model: z.string().optional(),
    apiKey: z.string().optional(),
    baseURL: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().positive().optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    requestTimeout: z.number().positive().optional(),
    maxRetries: z.number().int().min(0).optional(),
    retryDelay: z.number().int().min(0).optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export interface ProtocolMethods {
    initialize: string
    initialized: string
    callTool: string
    listTools: string
}

export interface ServerConfig {
    command: string
    args: string[]
    env: Record<string, string>
    methods: ProtocolMethods
}

export interface ResolvedConfig {
    server: ServerConfig
    model: string
    apiKey: string
    baseURL: string
    temperature: number
    maxTokens: number
    logLevel: LogLevel
    /** Seconds. */
    requestTimeout: number
    maxRetries: number
    /** Milliseconds. */
    retryDelay: number
    projectDir: string
    configDir: string
}
