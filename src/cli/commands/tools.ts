import type { McpSession } from '../../core/container.js'
import { formatToolList } from '../ui.js'

export async function toolsCommand(session: McpSession): Promise<void> {
    const tools = await session.client.listTools()
    console.log(formatToolList(tools))
}
