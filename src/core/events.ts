export type EventMap = {
    'conversation:iteration': { iteration: number; maxIterations: number }
    'tool:before': { toolName: string; callId: string; args: Record<string, unknown> }
    'tool:after': { toolName: string; callId: string; duration: number; success: boolean }
}

type EventHandler<T> = (data: T) => void

type HandlerSets = { [K in keyof EventMap]?: Set<EventHandler<EventMap[K]>> }

export class TypedEventEmitter {
    private handlers: HandlerSets = {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlersFor(event).add(handler)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers[event]?.delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set = this.handlers[event]
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch {
                // listener failures stay with the listener
            }
        }
    }

    removeAll(): void {
        this.handlers = {}
    }

    private handlersFor<K extends keyof EventMap>(event: K): Set<EventHandler<EventMap[K]>> {
        const existing = this.handlers[event]
        if (existing) return existing
        const created = new Set<EventHandler<EventMap[K]>>()
        const handlers: { [P in K]?: Set<EventHandler<EventMap[P]>> } = this.handlers
        handlers[event] = created
        return created
    }
}
