import os from 'node:os'
import path from 'node:path'
import type { ProtocolMethods, ResolvedConfig } from './schema.js'

export const DEFAULT_METHODS: ProtocolMethods = {
    initialize: 'initialize',
    initialized: 'notifications/initialized',
    callTool: 'tools/call',
    listTools: 'tools/list',
}

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir'> = {
    server: {
        command: 'mcp-todo-server',
        args: [],
        env: {},
        methods: DEFAULT_METHODS,
    },
    model: 'deepseek-chat',
    apiKey: '',
    baseURL: 'https://api.deepseek.com',
    temperature: 0.7,
    maxTokens: 4000,
    logLevel: 'warn',
    requestTimeout: 30,
    maxRetries: 3,
    retryDelay: 1000,
}

export const CONFIG_DIR = path.join(process.env.HOME ?? os.homedir(), '.config', 'taskbridge')
export const GLOBAL_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')
export const LOCAL_CONFIG_DIR = '.taskbridge'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
