import type { McpSession } from '../../core/container.js'
import { formatTasksByStatus } from '../../report/table.js'

export async function statusCommand(session: McpSession, status: string): Promise<void> {
    const tasks = await session.tasks.getTasksByStatus(status)
    if (tasks.length === 0) {
        console.log(`No tasks found with status '${status}'`)
        return
    }
    console.log(formatTasksByStatus(tasks, status))
}
