import type { Task } from '../mcp/types.js'

const HEADERS = ['ID', 'Title', 'Status', 'Priority', 'Due Date', 'Created', 'Tags']

const ID_WIDTH = 8
const TITLE_WIDTH = 40
const TAGS_WIDTH = 30

const RFC3339 = /^(\d{4}-\d{2}-\d{2})[Tt]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/
const DATE_TIME = /^(\d{4}-\d{2}-\d{2}) \d{2}:\d{2}:\d{2}$/

export function truncate(text: string, maxLength: number): string {
    if (text.length <= maxLength) return text
    return `${text.slice(0, Math.max(0, maxLength - 3))}...`
}

/** `YYYY-MM-DD` for RFC 3339 and `YYYY-MM-DD HH:MM:SS` values, otherwise the first 10 characters. */
export function formatDate(value: string | undefined): string {
    if (value === undefined) return 'N/A'
    const match = RFC3339.exec(value) ?? DATE_TIME.exec(value)
    if (match?.[1] && !Number.isNaN(Date.parse(match[1]))) return match[1]
    return truncate(value, 10)
}

function formatTags(tags: string[] | undefined): string {
    if (!tags || tags.length === 0) return 'N/A'
    return truncate(tags.join(', '), TAGS_WIDTH)
}

export function toTableRow(task: Task): string[] {
    return [
        truncate(task.id, ID_WIDTH),
        truncate(task.title, TITLE_WIDTH),
        task.status,
        task.priority ?? 'N/A',
        formatDate(task.due_date),
        formatDate(task.created_at),
        formatTags(task.tags),
    ]
}

export function renderTable(headers: string[], rows: string[][]): string {
    const widths = headers.map((header, col) => Math.max(header.length, ...rows.map((row) => (row[col] ?? '').length)))
    const rule = (left: string, mid: string, right: string) =>
        `${left}${widths.map((width) => '─'.repeat(width + 2)).join(mid)}${right}`
    const line = (cells: string[]) =>
        `│${widths.map((width, col) => ` ${(cells[col] ?? '').padEnd(width)} `).join('│')}│`

    return [rule('┌', '┬', '┐'), line(headers), rule('├', '┼', '┤'), ...rows.map(line), rule('└', '┴', '┘')].join(
        '\n'
    )
}

function titledTable(title: string, tasks: Task[]): string {
    return `\n${title} (${tasks.length} total)\n${'='.repeat(80)}\n${renderTable(HEADERS, tasks.map(toTableRow))}`
}

export function formatAllTasks(tasks: Task[]): string {
    if (tasks.length === 0) return 'No tasks found.'
    return titledTable('All Tasks', tasks)
}

export function formatUnfinishedTasks(tasks: Task[]): string {
    if (tasks.length === 0) return 'No unfinished tasks found.'
    return titledTable('Unfinished Tasks', tasks)
}

export function formatTasksByStatus(tasks: Task[], status: string): string {
    return titledTable(`Tasks with status '${status}'`, tasks)
}

export function formatSummaryStatistics(unfinished: Task[], totalTasks: number): string {
    const rate = totalTasks > 0 ? ((totalTasks - unfinished.length) / totalTasks) * 100 : 0
    return [
        '',
        'Task Summary',
        '='.repeat(40),
        `Total Tasks: ${totalTasks}`,
        `Unfinished Tasks: ${unfinished.length}`,
        `Completion Rate: ${rate.toFixed(1)}%`,
        '',
    ].join('\n')
}

export interface PriorityCounts {
    high: number
    medium: number
    low: number
    none: number
}

export function countPriorities(tasks: Task[]): PriorityCounts {
    const counts: PriorityCounts = { high: 0, medium: 0, low: 0, none: 0 }
    for (const task of tasks) {
        switch ((task.priority ?? '').toLowerCase()) {
            case 'high':
            case 'urgent':
            case 'critical':
                counts.high++
                break
            case 'medium':
            case 'normal':
                counts.medium++
                break
            case 'low':
                counts.low++
                break
            default:
                counts.none++
        }
    }
    return counts
}

export function formatPriorityBreakdown(tasks: Task[]): string {
    const counts = countPriorities(tasks)
    const lines = ['', 'Priority Breakdown', '='.repeat(30)]
    if (counts.high > 0) lines.push(`High Priority: ${counts.high}`)
    if (counts.medium > 0) lines.push(`Medium Priority: ${counts.medium}`)
    if (counts.low > 0) lines.push(`Low Priority: ${counts.low}`)
    if (counts.none > 0) lines.push(`No Priority Set: ${counts.none}`)
    return `${lines.join('\n')}\n`
}

/** Tasks whose due date is a valid RFC 3339 timestamp earlier than `now`. */
export function findOverdueTasks(tasks: Task[], now: Date = new Date()): Task[] {
    return tasks.filter((task) => {
        if (task.due_date === undefined || !RFC3339.test(task.due_date)) return false
        const due = Date.parse(task.due_date)
        return !Number.isNaN(due) && due < now.getTime()
    })
}

export function formatOverdueTasks(tasks: Task[], now: Date = new Date()): string {
    const overdue = findOverdueTasks(tasks, now)
    if (overdue.length === 0) return 'No overdue tasks found.'
    return titledTable('Overdue Tasks', overdue)
}
