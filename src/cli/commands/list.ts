import type { McpSession } from '../../core/container.js'
import { formatAllTasks } from '../../report/table.js'

export async function listCommand(session: McpSession): Promise<void> {
    const tasks = await session.tasks.getAllTasks()
    console.log(formatAllTasks(tasks))
}
