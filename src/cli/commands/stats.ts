import type { McpSession } from '../../core/container.js'
import { isTaskUnfinished } from '../../mcp/tasks.js'
import {
    findOverdueTasks,
    formatOverdueTasks,
    formatPriorityBreakdown,
    formatSummaryStatistics,
} from '../../report/table.js'
import { colors } from '../ui.js'

export async function statsCommand(session: McpSession, now: Date = new Date()): Promise<void> {
    const all = await session.tasks.getAllTasks()
    const unfinished = all.filter(isTaskUnfinished)

    console.log(formatSummaryStatistics(unfinished, all.length))
    console.log(formatPriorityBreakdown(unfinished))

    if (findOverdueTasks(unfinished, now).length > 0) {
        console.log(formatOverdueTasks(unfinished, now))
    } else {
        console.log(colors.success('\nNo overdue tasks found!'))
    }
}
