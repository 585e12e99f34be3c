import { z } from 'zod'
import { ParseError, ToolExecutionError } from '../core/errors.js'
import type { Result } from '../core/result.js'
import { err, ok } from '../core/result.js'
import type { Logger } from '../logger/index.js'
import type { Task, TaskListResponse, TaskQuery, ToolCallResult, ToolCaller } from './types.js'

const FINISHED_STATUSES = new Set(['completed', 'done', 'finished', 'closed', 'resolved'])
const UNFINISHED_STATUSES = new Set(['pending', 'in_progress', 'todo', 'incomplete', 'new', 'open', 'active'])

/**
 * Known finished and unfinished statuses decide directly (case-insensitive);
 * any other status counts as unfinished until a completion timestamp is set.
 */
export function isTaskUnfinished(task: Pick<Task, 'status' | 'completed_at'>): boolean {
    const status = task.status.toLowerCase()
    if (FINISHED_STATUSES.has(status)) return false
    if (UNFINISHED_STATUSES.has(status)) return true
    return task.completed_at === undefined
}

const optionalString = z
    .string()
    .nullish()
    .transform((value) => value ?? undefined)

export const TaskSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    title: z.string(),
    description: optionalString,
    status: z.string(),
    priority: optionalString,
    due_date: optionalString,
    created_at: z.string(),
    updated_at: optionalString,
    completed_at: optionalString,
    tags: z
        .array(z.string())
        .nullish()
        .transform((value) => value ?? undefined),
})

const TaskListResponseSchema = z.object({
    tasks: z.array(TaskSchema),
    total: z.number().int().nonnegative().optional(),
    page: z.number().int().positive().optional(),
    page_size: z.number().int().nonnegative().optional(),
})

const TaskArraySchema = z.array(TaskSchema)

export type TaskPayload = { shape: 'envelope'; response: TaskListResponse } | { shape: 'array'; tasks: Task[] }

/**
 * The server's task payload is not pinned down: some versions answer with the
 * paged `{ tasks, total, page, page_size }` envelope, others with a bare array
 * of tasks. The envelope is tried first, then the array.
 */
export function parseTaskPayload(value: unknown): Result<TaskPayload> {
    const envelope = TaskListResponseSchema.safeParse(value)
    if (envelope.success) {
        const { tasks } = envelope.data
        return ok({
            shape: 'envelope',
            response: {
                tasks,
                total: envelope.data.total ?? tasks.length,
                page: envelope.data.page ?? 1,
                page_size: envelope.data.page_size ?? tasks.length,
            },
        })
    }

    const bare = TaskArraySchema.safeParse(value)
    if (bare.success) return ok({ shape: 'array', tasks: bare.data })

    return err(bare.error.message)
}

function contentText(result: ToolCallResult): string {
    return result.content
        .map((block) => (block.type === 'text' ? block.text : JSON.stringify(block)))
        .join('\n')
}

/** Extracts the JSON value carried by the first text block of a tool result. */
export function extractJsonPayload(toolName: string, result: ToolCallResult): unknown {
    if (result.isError) {
        throw new ToolExecutionError(`Tool '${toolName}' reported an error: ${contentText(result) || 'no details'}`)
    }

    const first = result.content[0]
    if (!first) {
        throw new ParseError('No content returned from MCP server', '')
    }
    if (first.type !== 'text') {
        throw new ParseError(`Expected text content from '${toolName}', got '${first.type}'`, JSON.stringify(first))
    }

    try {
        return JSON.parse(first.text)
    } catch (error) {
        throw new ParseError(`Failed to parse '${toolName}' response as JSON`, first.text, { cause: error })
    }
}

export class TaskService {
    constructor(
        private client: ToolCaller,
        private logger: Logger
    ) {}

    async getAllTasks(): Promise<Task[]> {
        this.logger.debug('tasks:fetch-all')
        const tasks = await this.fetchTasks('list_tasks', {})
        this.logger.debug({ count: tasks.length }, 'tasks:fetched')
        return tasks
    }

    async getTasks(query: TaskQuery): Promise<TaskListResponse> {
        const args: Record<string, unknown> = {}
        if (query.page !== undefined) args.page = query.page
        if (query.pageSize !== undefined) args.page_size = query.pageSize
        if (query.status !== undefined) args.status = query.status
        if (query.priority !== undefined) args.priority = query.priority
        if (query.tag !== undefined) args.tag = query.tag

        this.logger.debug({ query: args }, 'tasks:query')
        const payload = await this.fetchPayload('get_tasks', args)
        if (payload.shape === 'envelope') return payload.response

        const { tasks } = payload
        return {
            tasks,
            total: tasks.length,
            page: query.page ?? 1,
            page_size: query.pageSize ?? tasks.length,
        }
    }

    async getTasksByStatus(status: string): Promise<Task[]> {
        const wanted = status.toLowerCase()
        const tasks = await this.fetchTasks('list_tasks', { status })
        return tasks.filter((task) => task.status.toLowerCase() === wanted)
    }

    async getUnfinishedTasks(): Promise<Task[]> {
        const unfinished = (await this.getAllTasks()).filter(isTaskUnfinished)
        this.logger.info({ count: unfinished.length }, 'tasks:unfinished')
        return unfinished
    }

    private async fetchTasks(toolName: string, args: Record<string, unknown>): Promise<Task[]> {
        const payload = await this.fetchPayload(toolName, args)
        return payload.shape === 'envelope' ? payload.response.tasks : payload.tasks
    }

    private async fetchPayload(toolName: string, args: Record<string, unknown>): Promise<TaskPayload> {
        const result = await this.client.callTool(toolName, args)
        const value = extractJsonPayload(toolName, result)
        const payload = parseTaskPayload(value)
        if (!payload.ok) {
            this.logger.error({ tool: toolName, error: payload.error }, 'tasks:parse-failed')
            throw new ParseError(`Failed to parse tasks response from MCP server: ${payload.error}`, JSON.stringify(value))
        }
        return payload.value
    }
}
