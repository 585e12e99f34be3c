import type { TypedEventEmitter } from '../core/events.js'
import { EndpointError } from '../core/errors.js'
import type { LLMClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import type { Task } from '../mcp/types.js'
import type { AnalysisReport } from '../report/types.js'
import type { ToolBridge } from '../tools/bridge.js'
import { ConversationOrchestrator } from './orchestrator.js'
import {
    ANALYSIS_SYSTEM_PROMPT,
    TOOL_ASSISTANT_SYSTEM_PROMPT,
    buildAnalysisPrompt,
    buildToolAnalysisPrompt,
} from './system-prompt.js'

export interface AnalyzerOptions {
    model: string
    temperature: number
    maxTokens: number
}

export function formatTasksForAnalysis(tasks: Task[]): string {
    return tasks
        .map((task, idx) => {
            const lines = [`Task ${idx + 1}: ${task.title}`]
            if (task.description !== undefined) lines.push(`  Description: ${task.description}`)
            lines.push(`  Status: ${task.status}`)
            if (task.priority !== undefined) lines.push(`  Priority: ${task.priority}`)
            if (task.due_date !== undefined) lines.push(`  Due Date: ${task.due_date}`)
            if (task.tags !== undefined) lines.push(`  Tags: ${task.tags.join(', ')}`)
            lines.push(`  Created: ${task.created_at}`)
            return `${lines.join('\n')}\n\n`
        })
        .join('')
}

export class TaskAnalyzer {
    constructor(
        private llmClient: LLMClient,
        private logger: Logger,
        private options: AnalyzerOptions,
        private eventBus?: TypedEventEmitter
    ) {}

    /** Single completion without tools. */
    async analyzeTasks(tasks: Task[]): Promise<string> {
        this.logger.info({ count: tasks.length }, 'analysis:start')
        const response = await this.llmClient.chat({
            model: this.options.model,
            messages: [
                { role: 'system', content: ANALYSIS_SYSTEM_PROMPT },
                { role: 'user', content: buildAnalysisPrompt(formatTasksForAnalysis(tasks), tasks.length) },
            ],
            temperature: this.options.temperature,
            maxTokens: this.options.maxTokens,
        })

        if (response.content === null) {
            throw new EndpointError('No response text received from chat completion endpoint', 200)
        }
        return response.content
    }

    async analyzeTasksWithTools(tasks: Task[], bridge: ToolBridge): Promise<AnalysisReport> {
        const start = performance.now()
        this.logger.info({ count: tasks.length }, 'analysis:start-with-tools')

        const tools = await bridge.buildCatalog()
        const orchestrator = new ConversationOrchestrator(
            this.llmClient,
            bridge,
            this.logger,
            {
                model: this.options.model,
                temperature: this.options.temperature,
                maxTokens: this.options.maxTokens,
            },
            this.eventBus
        )

        const result = await orchestrator.run({
            systemPrompt: TOOL_ASSISTANT_SYSTEM_PROMPT,
            userMessage: buildToolAnalysisPrompt(formatTasksForAnalysis(tasks), tasks.length),
            tools,
        })

        return {
            timestamp: new Date(),
            model: this.options.model,
            taskCount: tasks.length,
            tasks,
            analysis: result.content,
            metadata: {
                toolsEnabled: true,
                toolCallsCount: result.toolCallCount,
                analysisDurationSeconds: (performance.now() - start) / 1000,
            },
        }
    }

    /** Wraps a plain analysis into a report so both paths can be saved the same way. */
    async analyzeTasksReport(tasks: Task[]): Promise<AnalysisReport> {
        const start = performance.now()
        const analysis = await this.analyzeTasks(tasks)
        return {
            timestamp: new Date(),
            model: this.options.model,
            taskCount: tasks.length,
            tasks,
            analysis,
            metadata: {
                toolsEnabled: false,
                analysisDurationSeconds: (performance.now() - start) / 1000,
            },
        }
    }
}
