import { access, mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'

export interface FileSystem {
    readText(path: string): Promise<string>
    readJSON<T>(path: string): Promise<T>
    writeText(path: string, content: string): Promise<void>
    exists(path: string): Promise<boolean>
    mkdir(path: string): Promise<void>
}

export class NodeFileSystem implements FileSystem {
    async readText(filePath: string): Promise<string> {
        return readFile(filePath, 'utf8')
    }

    async readJSON<T>(filePath: string): Promise<T> {
        return JSON.parse(await this.readText(filePath)) as T
    }

    async writeText(filePath: string, content: string): Promise<void> {
        await writeFile(filePath, content, 'utf8')
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await access(filePath)
            return true
        } catch {
            return false
        }
    }

    async mkdir(dirPath: string): Promise<void> {
        await mkdir(dirPath, { recursive: true })
    }
}

export class MockFileSystem implements FileSystem {
    private files = new Map<string, string>()
    private dirs = new Set<string>()

    async readText(filePath: string): Promise<string> {
        const content = this.files.get(filePath)
        if (content === undefined) throw new Error(`ENOENT: ${filePath}`)
        return content
    }

    async readJSON<T>(filePath: string): Promise<T> {
        return JSON.parse(await this.readText(filePath)) as T
    }

    async writeText(filePath: string, content: string): Promise<void> {
        this.files.set(filePath, content)
    }

    async exists(filePath: string): Promise<boolean> {
        return this.files.has(filePath) || this.dirs.has(filePath)
    }

    async mkdir(dirPath: string): Promise<void> {
        let current = dirPath
        while (current !== path.dirname(current)) {
            this.dirs.add(current)
            current = path.dirname(current)
        }
    }

    setFile(filePath: string, content: string): void {
        this.files.set(filePath, content)
    }

    getFiles(): Map<string, string> {
        return new Map(this.files)
    }

    hasDir(dirPath: string): boolean {
        return this.dirs.has(dirPath)
    }
}
