import * as clack from '@clack/prompts'
import type { Container, McpSession } from '../../core/container.js'
import { ConfigError } from '../../core/errors.js'
import { saveReport } from '../../report/format.js'
import type { AnalysisReport } from '../../report/types.js'
import { createProgressTracker } from '../progress.js'
import { colors, formatPendingTasks } from '../ui.js'

export interface AnalyzeOptions {
    tools: boolean
    output?: string
}

export async function analyzeCommand(container: Container, session: McpSession, options: AnalyzeOptions): Promise<void> {
    const pending = await session.tasks.getTasksByStatus('pending')
    if (pending.length === 0) {
        console.log(colors.success('No pending tasks found to analyze!'))
        return
    }

    if (!container.config.apiKey) {
        throw new ConfigError('No API key configured. Set TASKBRIDGE_API_KEY or pass --key <key>.')
    }

    console.log(`\n${formatPendingTasks(pending)}\n`)

    const spinner = clack.spinner()
    spinner.start(`Analyzing tasks with ${container.config.model}...`)
    const tracker = createProgressTracker(container.eventBus, spinner)

    let report: AnalysisReport
    try {
        report = options.tools
            ? await container.analyzer.analyzeTasksWithTools(pending, session.bridge)
            : await container.analyzer.analyzeTasksReport(pending)
        spinner.stop(colors.success('Analysis complete'))
    } catch (error) {
        spinner.stop(colors.error('Analysis failed'))
        throw error
    } finally {
        tracker.dispose()
    }

    console.log(`${colors.bold('Analysis Results:')}\n`)
    console.log(report.analysis)
    if (report.metadata.toolCallsCount !== undefined) {
        console.log(colors.dim(`\nTool calls: ${report.metadata.toolCallsCount}`))
    }

    if (options.output) {
        const format = await saveReport(container.fs, report, options.output)
        console.log(colors.success(`\nReport saved to ${options.output} (${format})`))
    }
}
