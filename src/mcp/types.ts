export interface Task {
    id: string
    title: string
    description?: string
    status: string
    priority?: string
    due_date?: string
    created_at: string
    updated_at?: string
    completed_at?: string
    tags?: string[]
}

export interface TaskListResponse {
    tasks: Task[]
    total: number
    page: number
    page_size: number
}

export interface TaskQuery {
    page?: number
    pageSize?: number
    status?: string
    priority?: string
    tag?: string
}

export interface ToolDescriptor {
    name: string
    description?: string
    /** JSON-Schema-like value as advertised by the server; not guaranteed to be an object schema. */
    inputSchema: unknown
}

export type ContentBlock =
    | { type: 'text'; text: string }
    | { type: 'image'; data: string; mimeType: string }
    | { type: 'audio'; data: string; mimeType: string }
    | { type: 'resource'; resource: Record<string, unknown> }
    | { type: 'resource_link'; uri: string; name?: string }

export interface ToolCallResult {
    content: ContentBlock[]
    isError?: boolean
    structuredContent?: Record<string, unknown>
}

/** The part of the protocol client the task service and the tool bridge depend on. */
export interface ToolCaller {
    callTool(name: string, args?: Record<string, unknown>): Promise<ToolCallResult>
    listTools(): Promise<ToolDescriptor[]>
}

export type ClientState = 'uninitialized' | 'initializing' | 'ready' | 'failed' | 'closed'
