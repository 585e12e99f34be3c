import pc from 'picocolors'
import type { Task, ToolDescriptor } from '../mcp/types.js'
import { isPlainObject } from '../tools/catalog.js'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    tool: (name: string) => pc.blue(name),
}

export function banner(): string {
    return `${colors.brand('taskbridge')} ${colors.dim('v0.1.0')}`
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

function parameterNames(schema: unknown): string[] {
    if (!isPlainObject(schema) || !isPlainObject(schema.properties)) return []
    return Object.keys(schema.properties)
}

export function formatToolList(tools: ToolDescriptor[]): string {
    if (tools.length === 0) return 'No tools available on the MCP server'

    const entries = tools.map((tool, idx) => {
        const lines = [`${idx + 1}. ${colors.tool(tool.name)}`]
        lines.push(`   Description: ${tool.description || '<No description available>'}`)
        const params = parameterNames(tool.inputSchema)
        if (params.length > 0) lines.push(`   Parameters: ${params.join(', ')}`)
        return lines.join('\n')
    })
    return `Available tools on MCP server:\n\n${entries.join('\n\n')}\n`
}

export function formatPendingTasks(tasks: Task[]): string {
    const lines = [`Found ${tasks.length} pending tasks:`]
    tasks.forEach((task, idx) => {
        lines.push(`  ${idx + 1}. ${task.title} (Status: ${task.status})`)
        if (task.priority !== undefined) lines.push(`     Priority: ${task.priority}`)
        if (task.due_date !== undefined) lines.push(`     Due: ${task.due_date}`)
    })
    return lines.join('\n')
}
