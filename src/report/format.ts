import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import type { Task } from '../mcp/types.js'
import type { AnalysisReport, OutputFormat } from './types.js'

const RULE = '==============================================='

/** Chooses the report format from the file extension; anything unrecognised is Markdown. */
export function outputFormatFromPath(filePath: string): OutputFormat {
    switch (path.extname(filePath).slice(1)) {
        case 'json':
            return 'json'
        case 'md':
        case 'markdown':
            return 'markdown'
        case 'txt':
        case 'text':
            return 'text'
        default:
            return 'markdown'
    }
}

export function formatTimestamp(date: Date): string {
    return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`
}

function formatDuration(seconds: number | undefined): string {
    return seconds === undefined ? 'N/A' : `${seconds.toFixed(1)}s`
}

function formatToolCalls(count: number | undefined): string {
    return count === undefined ? 'N/A' : String(count)
}

function markdownTaskSummary(tasks: Task[]): string {
    return tasks
        .map((task, idx) => {
            let entry = `### ${idx + 1}. ${task.title}\n\n`
            if (task.description !== undefined) entry += `**Description:** ${task.description}\n\n`
            entry += `**Status:** ${task.status}\n`
            if (task.priority !== undefined) entry += `**Priority:** ${task.priority}\n`
            if (task.due_date !== undefined) entry += `**Due Date:** ${task.due_date}\n`
            if (task.tags && task.tags.length > 0) entry += `**Tags:** ${task.tags.join(', ')}\n`
            entry += `**Created:** ${task.created_at}\n\n`
            return `${entry}---\n\n`
        })
        .join('')
}

function textTaskSummary(tasks: Task[]): string {
    return tasks
        .map((task, idx) => {
            const lines = [`${idx + 1}. ${task.title}`]
            if (task.description !== undefined) lines.push(`   Description: ${task.description}`)
            lines.push(`   Status: ${task.status}`)
            if (task.priority !== undefined) lines.push(`   Priority: ${task.priority}`)
            if (task.due_date !== undefined) lines.push(`   Due Date: ${task.due_date}`)
            if (task.tags && task.tags.length > 0) lines.push(`   Tags: ${task.tags.join(', ')}`)
            lines.push(`   Created: ${task.created_at}`)
            return `${lines.join('\n')}\n\n`
        })
        .join('')
}

export function stripMarkdown(markdown: string): string {
    return markdown
        .replaceAll('### ', '')
        .replaceAll('## ', '')
        .replaceAll('# ', '')
        .replaceAll('**', '')
        .replaceAll('*', '')
        .replaceAll('`', '')
        .replaceAll('|', '')
        .replaceAll('---', '-'.repeat(RULE.length))
}

export function formatReportAsMarkdown(report: AnalysisReport): string {
    const timestamp = formatTimestamp(report.timestamp)
    const duration = formatDuration(report.metadata.analysisDurationSeconds)
    const toolCalls = formatToolCalls(report.metadata.toolCallsCount)

    return `# Task Analysis Report

**Generated:** ${timestamp}  
**Model:** ${report.model}  
**Tasks Analyzed:** ${report.taskCount}  
**Analysis Duration:** ${duration}  
**Tool Calls:** ${toolCalls}  

---

## Tasks Summary

${markdownTaskSummary(report.tasks)}
---

## AI Analysis

${report.analysis}

---

## Report Metadata

- **Tools Enabled:** ${report.metadata.toolsEnabled ? 'Yes' : 'No'}
- **Generation Time:** ${timestamp}
- **Processing Duration:** ${duration}
- **MCP Tool Interactions:** ${toolCalls}

---

*This report was generated automatically by taskbridge.*
`
}

export function formatReportAsText(report: AnalysisReport): string {
    const timestamp = formatTimestamp(report.timestamp)
    const duration = formatDuration(report.metadata.analysisDurationSeconds)
    const toolCalls = formatToolCalls(report.metadata.toolCallsCount)

    return `${RULE}
            TASK ANALYSIS REPORT
${RULE}

Generated: ${timestamp}
Model: ${report.model}
Tasks Analyzed: ${report.taskCount}
Analysis Duration: ${duration}
Tool Calls: ${toolCalls}

${RULE}
                TASKS SUMMARY
${RULE}

${textTaskSummary(report.tasks)}
${RULE}
               AI ANALYSIS
${RULE}

${stripMarkdown(report.analysis)}

${RULE}
              REPORT METADATA
${RULE}

Tools Enabled: ${report.metadata.toolsEnabled ? 'Yes' : 'No'}
Generation Time: ${timestamp}
Processing Duration: ${duration}
MCP Tool Interactions: ${toolCalls}

${RULE}

This report was generated automatically by taskbridge.
`
}

/** Wire shape of a saved JSON report; absent metadata values are written as `null`. */
export function toReportJson(report: AnalysisReport) {
    return {
        timestamp: report.timestamp.toISOString(),
        model: report.model,
        task_count: report.taskCount,
        tasks: report.tasks,
        analysis: report.analysis,
        metadata: {
            tools_enabled: report.metadata.toolsEnabled,
            tool_calls_count: report.metadata.toolCallsCount ?? null,
            analysis_duration_seconds: report.metadata.analysisDurationSeconds ?? null,
        },
    }
}

export function renderReport(report: AnalysisReport, format: OutputFormat): string {
    switch (format) {
        case 'json':
            return JSON.stringify(toReportJson(report), null, 2)
        case 'markdown':
            return formatReportAsMarkdown(report)
        case 'text':
            return formatReportAsText(report)
    }
}

/** Writes the report in the format implied by `filePath`, creating parent directories first. */
export async function saveReport(fs: FileSystem, report: AnalysisReport, filePath: string): Promise<OutputFormat> {
    const format = outputFormatFromPath(filePath)
    const dir = path.dirname(filePath)
    if (dir !== '.') await fs.mkdir(dir)
    await fs.writeText(filePath, renderReport(report, format))
    return format
}
