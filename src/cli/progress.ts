import type { EventMap, TypedEventEmitter } from '../core/events.js'
import type { BuiltinToolName } from '../tools/catalog.js'
import { SERVER_TOOL_PREFIX, isBuiltinToolName } from '../tools/catalog.js'

const TOOL_LABELS: Record<BuiltinToolName, string> = {
    mcp_invoke: 'Invoking MCP tool...',
    list_tasks: 'Listing tasks...',
    get_task: 'Loading task details...',
    task_stats: 'Collecting task statistics...',
}

interface Spinner {
    message(msg: string): void
}

export interface ProgressTracker {
    dispose(): void
}

export function toolLabel(toolName: string): string {
    if (isBuiltinToolName(toolName)) return TOOL_LABELS[toolName]
    if (toolName.startsWith(SERVER_TOOL_PREFIX)) {
        return `Calling ${toolName.slice(SERVER_TOOL_PREFIX.length)}...`
    }
    return `Calling ${toolName}...`
}

export function createProgressTracker(eventBus: TypedEventEmitter, spinner: Spinner): ProgressTracker {
    const onIteration = (data: EventMap['conversation:iteration']) => {
        spinner.message(`Analyzing (step ${data.iteration}/${data.maxIterations})...`)
    }

    const onToolBefore = (data: EventMap['tool:before']) => {
        spinner.message(toolLabel(data.toolName))
    }

    const onToolAfter = (data: EventMap['tool:after']) => {
        const secs = (data.duration / 1000).toFixed(1)
        spinner.message(data.success ? `${data.toolName} done (${secs}s)` : `${data.toolName} failed (${secs}s)`)
    }

    eventBus.on('conversation:iteration', onIteration)
    eventBus.on('tool:before', onToolBefore)
    eventBus.on('tool:after', onToolAfter)

    return {
        dispose() {
            eventBus.off('conversation:iteration', onIteration)
            eventBus.off('tool:before', onToolBefore)
            eventBus.off('tool:after', onToolAfter)
        },
    }
}
