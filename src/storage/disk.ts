/**
 * Local filesystem storage: keys are POSIX paths relative to a root folder
 * (for CSV sources, the raw data directory).
 */
import { access, mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname, join, relative, resolve, sep } from "node:path";
import type { StorageBackend } from "./backend.js";

async function* walkFiles(dir: string): AsyncGenerator<string> {
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walkFiles(full);
    } else if (entry.isFile()) {
      yield full;
    }
  }
}

export class DiskStorage implements StorageBackend {
  private root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  private pathOf(key: string): string {
    return join(this.root, key);
  }

  private keyOf(fullPath: string): string {
    return relative(this.root, fullPath).split(sep).join("/");
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    const target = this.pathOf(key);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, data);
  }

  async read(key: string): Promise<Uint8Array> {
    return new Uint8Array(await readFile(this.pathOf(key)));
  }

  async list(prefix: string): Promise<string[]> {
    const start = this.pathOf(prefix);
    const info = await stat(start).catch(() => null);
    if (!info) return [];
    if (info.isFile()) return [this.keyOf(start)];

    const keys: string[] = [];
    for await (const file of walkFiles(start)) {
      keys.push(this.keyOf(file));
    }
    return keys.sort();
  }

  async exists(key: string): Promise<boolean> {
    return access(this.pathOf(key)).then(
      () => true,
      () => false,
    );
  }
}
