import * as path from "path";
import { promises as fsPromises, constants as fsConstants } from "fs";

export interface FileStats {
    size: number;
    mtime: number;
    isDirectory(): boolean;
}

/**
 * Every component reads the workspace through this seam; tests swap in
 * MemoryFileSystem.
 */
export interface IFileSystem {
    readFile(path: string): Promise<string>;
    writeFile(path: string, content: string): Promise<void>;
    exists(path: string): Promise<boolean>;
    readDir(path: string): Promise<string[]>;
    stat(path: string): Promise<FileStats>;
    resolve(path: string): string;
}

export class NodeFileSystem implements IFileSystem {
    private readonly rootPath: string;

    constructor(rootPath: string) {
        this.rootPath = path.resolve(rootPath);
    }

    resolve(targetPath: string): string {
        if (!targetPath) {
            return this.rootPath;
        }
        return path.isAbsolute(targetPath)
            ? path.normalize(targetPath)
            : path.join(this.rootPath, targetPath);
    }

    async readFile(targetPath: string): Promise<string> {
        return fsPromises.readFile(this.resolve(targetPath), "utf-8");
    }

    async writeFile(targetPath: string, content: string): Promise<void> {
        const resolved = this.resolve(targetPath);
        await fsPromises.mkdir(path.dirname(resolved), { recursive: true });
        await fsPromises.writeFile(resolved, content, "utf-8");
    }

    async exists(targetPath: string): Promise<boolean> {
        try {
            await fsPromises.access(this.resolve(targetPath), fsConstants.F_OK);
            return true;
        } catch {
            return false;
        }
    }

    async readDir(targetPath: string): Promise<string[]> {
        const entries = await fsPromises.readdir(this.resolve(targetPath));
        return entries.sort();
    }

    async stat(targetPath: string): Promise<FileStats> {
        const stats = await fsPromises.stat(this.resolve(targetPath));
        return {
            size: stats.size,
            mtime: stats.mtimeMs,
            isDirectory: () => stats.isDirectory(),
        };
    }
}

interface MemoryFileEntry {
    content: string;
    mtime: number;
}

export class MemoryFileSystem implements IFileSystem {
    private readonly rootPath: string;
    private readonly files = new Map<string, MemoryFileEntry>();
    private readonly directories = new Map<string, number>();
    // logical clock keeps mtimes strictly increasing within a test
    private clock = 0;

    constructor(rootPath: string = process.cwd()) {
        this.rootPath = path.resolve(rootPath);
        this.directories.set(this.rootPath, this.tick());
    }

    private tick(): number {
        this.clock += 1;
        return this.clock;
    }

    resolve(targetPath: string): string {
        if (!targetPath) {
            return this.rootPath;
        }
        return path.isAbsolute(targetPath)
            ? path.normalize(targetPath)
            : path.join(this.rootPath, targetPath);
    }

    private ensureParentDirectories(targetPath: string): void {
        let current = path.dirname(targetPath);
        while (!this.directories.has(current)) {
            this.directories.set(current, this.tick());
            const next = path.dirname(current);
            if (next === current) {
                break;
            }
            current = next;
        }
    }

    async readFile(targetPath: string): Promise<string> {
        const resolved = this.resolve(targetPath);
        const entry = this.files.get(resolved);
        if (!entry) {
            throw new Error(`ENOENT: no such file, open '${resolved}'`);
        }
        return entry.content;
    }

    async writeFile(targetPath: string, content: string): Promise<void> {
        const resolved = this.resolve(targetPath);
        this.ensureParentDirectories(resolved);
        this.files.set(resolved, { content, mtime: this.tick() });
    }

    async exists(targetPath: string): Promise<boolean> {
        const resolved = this.resolve(targetPath);
        return this.files.has(resolved) || this.directories.has(resolved);
    }

    async readDir(targetPath: string): Promise<string[]> {
        const resolved = this.resolve(targetPath);
        if (!this.directories.has(resolved)) {
            throw new Error(`ENOENT: no such directory, scandir '${resolved}'`);
        }
        const entries = new Set<string>();
        for (const candidate of [...this.files.keys(), ...this.directories.keys()]) {
            if (candidate !== resolved && path.dirname(candidate) === resolved) {
                entries.add(path.basename(candidate));
            }
        }
        return Array.from(entries.values()).sort();
    }

    async stat(targetPath: string): Promise<FileStats> {
        const resolved = this.resolve(targetPath);
        const file = this.files.get(resolved);
        if (file) {
            return {
                size: Buffer.byteLength(file.content, "utf-8"),
                mtime: file.mtime,
                isDirectory: () => false,
            };
        }
        const dirMtime = this.directories.get(resolved);
        if (dirMtime !== undefined) {
            return {
                size: 0,
                mtime: dirMtime,
                isDirectory: () => true,
            };
        }
        throw new Error(`ENOENT: no such file or directory, stat '${resolved}'`);
    }
}
