import { describe, it, expect } from 'vitest'
import { formatPendingTasks, formatToolList } from '../../../src/cli/ui.js'

const ANSI = /\u001b\[[0-9;]*m/g

function plain(text: string): string {
    return text.replace(ANSI, '')
}

describe('formatToolList', () => {
    it('reports an empty server', () => {
        expect(formatToolList([])).toBe('No tools available on the MCP server')
    })

    it('numbers tools with their description and parameters', () => {
        const text = formatToolList([
            {
                name: 'list_tasks',
                description: 'List tasks',
                inputSchema: { type: 'object', properties: { status: {}, tag: {} } },
            },
            { name: 'ping', inputSchema: 'none' },
        ])

        expect(plain(text)).toBe(
            'Available tools on MCP server:\n\n' +
                '1. list_tasks\n' +
                '   Description: List tasks\n' +
                '   Parameters: status, tag\n\n' +
                '2. ping\n' +
                '   Description: <No description available>\n'
        )
    })
})

describe('formatPendingTasks', () => {
    it('lists titles with optional priority and due date', () => {
        expect(
            formatPendingTasks([
                { id: '1', title: 'Call plumber', status: 'pending', priority: 'high', created_at: '2026-01-05T09:00:00Z' },
                { id: '2', title: 'Book venue', status: 'pending', due_date: '2026-04-01', created_at: '2026-01-05T09:00:00Z' },
            ])
        ).toBe(
            [
                'Found 2 pending tasks:',
                '  1. Call plumber (Status: pending)',
                '     Priority: high',
                '  2. Book venue (Status: pending)',
                '     Due: 2026-04-01',
            ].join('\n')
        )
    })
})
