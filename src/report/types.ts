import type { Task } from '../mcp/types.js'

export interface AnalysisMetadata {
    toolsEnabled: boolean
    toolCallsCount?: number
    analysisDurationSeconds?: number
}

export interface AnalysisReport {
    timestamp: Date
    model: string
    taskCount: number
    tasks: Task[]
    analysis: string
    metadata: AnalysisMetadata
}

export type OutputFormat = 'json' | 'markdown' | 'text'
