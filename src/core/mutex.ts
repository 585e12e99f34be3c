export type Release = () => void

/**
 * FIFO promise lock. Waiters are resumed in arrival order; a release
 * function only has an effect the first time it is called.
 */
export class Mutex {
    private locked = false
    private waiters: Array<(release: Release) => void> = []

    acquire(): Promise<Release> {
        if (!this.locked) {
            this.locked = true
            return Promise.resolve(this.createRelease())
        }
        return new Promise((resolve) => {
            this.waiters.push(resolve)
        })
    }

    tryAcquire(): Release | null {
        if (this.locked) return null
        this.locked = true
        return this.createRelease()
    }

    async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
        const release = await this.acquire()
        try {
            return await fn()
        } finally {
            release()
        }
    }

    isLocked(): boolean {
        return this.locked
    }

    private createRelease(): Release {
        let released = false
        return () => {
            if (released) return
            released = true
            const next = this.waiters.shift()
            if (next) {
                next(this.createRelease())
            } else {
                this.locked = false
            }
        }
    }
}
