import { createInterface } from 'node:readline'
import type { Readable, Writable } from 'node:stream'
import { execa } from 'execa'
import { ServerStartError, TransportError, errorMessage } from '../core/errors.js'
import { Mutex } from '../core/mutex.js'
import type { Logger } from '../logger/index.js'

/** Line-oriented access to a server process. */
export interface LineTransport {
    sendLine(line: string): Promise<void>
    /**
     * Resolves with the next stdout line, or `''` once stdout has ended. Rejects
     * instead when the process failed to start.
     */
    readLine(): Promise<string>
    /** Best-effort read of one stderr line within `timeoutMs`. */
    peekStderr(timeoutMs: number): Promise<string | null>
    close(): Promise<void>
}

export interface ChildHandle {
    stdin: Writable
    stdout: Readable
    stderr: Readable
    kill(): boolean
    readonly exitCode: number | null
    /** Settles once the process has exited or failed to start; rejects with the reason for failure. */
    exited: Promise<void>
}

export interface SpawnOptions {
    command: string
    args: string[]
    env?: Record<string, string>
}

export type SpawnFn = (options: SpawnOptions) => ChildHandle

const MAX_BUFFERED_STDERR = 50
const EXIT_SETTLE_MS = 500

export function resolveEnv(env?: Record<string, string>): Record<string, string> {
    if (!env) return {}
    const resolved: Record<string, string> = {}
    for (const [key, value] of Object.entries(env)) {
        resolved[key] = value.replace(/\$\{(\w+)\}/g, (_, name: string) => process.env[name] ?? '')
    }
    return resolved
}

export const spawnWithExeca: SpawnFn = (options) => {
    const subprocess = execa(options.command, options.args, {
        env: resolveEnv(options.env),
        extendEnv: true,
        stdin: 'pipe',
        stdout: 'pipe',
        stderr: 'pipe',
        buffer: false,
        reject: false,
        stripFinalNewline: false,
    })

    const { stdin, stdout, stderr } = subprocess
    if (!stdin || !stdout || !stderr) {
        subprocess.kill()
        throw new TransportError(`Failed to open stdio pipes for '${options.command}'`)
    }

    const exited = subprocess.then((result) => {
        if (result.failed && result.exitCode === undefined && !result.isTerminated) {
            throw new ServerStartError(`Failed to start MCP server '${options.command}': ${result.shortMessage}`)
        }
    })

    return {
        stdin,
        stdout,
        stderr,
        kill: () => subprocess.kill(),
        get exitCode() {
            return subprocess.exitCode
        },
        exited,
    }
}

/**
 * Buffers lines from a readable stream and hands them out one at a time.
 */
class LineQueue {
    private lines: string[] = []
    private waiters: Array<(line: string | null) => void> = []
    private ended = false

    constructor(
        stream: Readable,
        private maxBuffered = Number.POSITIVE_INFINITY
    ) {
        const rl = createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY })
        rl.on('line', (line) => this.push(line))
        rl.on('close', () => this.end())
        stream.on('error', () => this.end())
    }

    /** Next line, or `null` once the stream has ended and the buffer is drained. */
    next(timeoutMs?: number): Promise<string | null> {
        const buffered = this.lines.shift()
        if (buffered !== undefined) return Promise.resolve(buffered)
        if (this.ended) return Promise.resolve(null)

        return new Promise((resolve) => {
            let timer: NodeJS.Timeout | undefined
            const waiter = (line: string | null) => {
                if (timer) clearTimeout(timer)
                resolve(line)
            }
            this.waiters.push(waiter)
            if (timeoutMs !== undefined) {
                timer = setTimeout(() => {
                    this.waiters = this.waiters.filter((w) => w !== waiter)
                    resolve(null)
                }, timeoutMs)
            }
        })
    }

    private push(line: string): void {
        const waiter = this.waiters.shift()
        if (waiter) {
            waiter(line)
            return
        }
        this.lines.push(line)
        if (this.lines.length > this.maxBuffered) this.lines.shift()
    }

    private end(): void {
        if (this.ended) return
        this.ended = true
        for (const waiter of this.waiters.splice(0)) waiter(null)
    }
}

export class StdioTransport implements LineTransport {
    private writeLock = new Mutex()
    private readLock = new Mutex()
    private stderrLock = new Mutex()
    private stdout: LineQueue
    private stderr: LineQueue
    private exitError: Error | null = null
    private closed = false

    private constructor(
        private child: ChildHandle,
        private command: string,
        private logger: Logger
    ) {
        this.stdout = new LineQueue(child.stdout)
        this.stderr = new LineQueue(child.stderr, MAX_BUFFERED_STDERR)
        child.stdin.on('error', (error) => {
            this.exitError ??= new TransportError(`MCP server stdin closed: ${errorMessage(error)}`, { cause: error })
        })
        child.exited.then(
            () => this.logger.debug({ command, exitCode: child.exitCode }, 'mcp:process-exit'),
            (error: unknown) => {
                this.exitError = error instanceof Error ? error : new TransportError(errorMessage(error))
                this.logger.debug({ command, error: errorMessage(error) }, 'mcp:process-failed')
            }
        )
    }

    static spawn(options: SpawnOptions, logger: Logger, spawnFn: SpawnFn = spawnWithExeca): StdioTransport {
        logger.debug({ command: options.command, args: options.args }, 'mcp:spawn')
        try {
            return new StdioTransport(spawnFn(options), options.command, logger)
        } catch (error) {
            if (error instanceof TransportError) throw error
            throw new ServerStartError(`Failed to start MCP server '${options.command}': ${errorMessage(error)}`, {
                cause: error,
            })
        }
    }

    async sendLine(line: string): Promise<void> {
        try {
            await this.write(line)
        } catch (error) {
            if (this.closed) throw error
            // the start failure, when there is one, names the cause better than EPIPE
            throw (await this.exitFailure()) ?? error
        }
    }

    private async write(line: string): Promise<void> {
        await this.writeLock.runExclusive(async () => {
            this.assertWritable()
            const stdin = this.child.stdin
            await new Promise<void>((resolve, reject) => {
                stdin.write(`${line}\n`, 'utf8', (error) => {
                    if (error) {
                        reject(new TransportError(`Failed to write to MCP server: ${error.message}`, { cause: error }))
                    } else {
                        resolve()
                    }
                })
            })
        })
    }

    async readLine(): Promise<string> {
        return this.readLock.runExclusive(async () => {
            const line = await this.stdout.next()
            if (line !== null) return line
            const failure = this.closed ? null : await this.exitFailure()
            if (failure) throw failure
            return ''
        })
    }

    async peekStderr(timeoutMs: number): Promise<string | null> {
        return this.stderrLock.runExclusive(() => this.stderr.next(timeoutMs))
    }

    async close(): Promise<void> {
        if (this.closed) return
        this.closed = true
        this.child.stdin.end()
        if (this.child.exitCode !== null) return
        try {
            this.child.kill()
        } catch (error) {
            this.logger.debug({ command: this.command, error: errorMessage(error) }, 'mcp:kill-failed')
        }
    }

    /** Waits briefly for the process to settle and returns the recorded failure, if any. */
    private async exitFailure(): Promise<Error | null> {
        let timer: NodeJS.Timeout | undefined
        await Promise.race([
            this.child.exited.then(
                () => undefined,
                () => undefined
            ),
            new Promise<void>((resolve) => {
                timer = setTimeout(resolve, EXIT_SETTLE_MS)
            }),
        ])
        clearTimeout(timer)
        return this.exitError
    }

    private assertWritable(): void {
        if (this.closed) throw new TransportError('MCP transport is closed')
        if (this.exitError) throw this.exitError
        if (this.child.stdin.destroyed || this.child.stdin.writableEnded) {
            throw new TransportError(`MCP server '${this.command}' stdin is closed`)
        }
        if (this.child.exitCode !== null) {
            throw new TransportError(`MCP server '${this.command}' exited with code ${this.child.exitCode}`)
        }
    }
}
