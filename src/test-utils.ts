import { zipSync } from "fflate";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { OpenConnection, PrinterConnector, PrinterFileSystem } from "./ftps-client.js";
import { matchesExtension } from "./ftps-client.js";
import type { RemoteFile } from "./types.js";

type FakeEntry =
  | { kind: "file"; data: Uint8Array; modifiedAt: Date }
  | { kind: "directory" };

/**
 * In-memory SD card. With `reportKinds: false` the listing leaves every
 * child's kind as "unknown", like a server whose LIST output cannot be parsed.
 */
export class FakePrinter implements PrinterFileSystem {
  readonly entries = new Map<string, FakeEntry>();
  readonly downloads: string[] = [];
  readonly failingLists = new Map<string, string>();
  readonly failingDates = new Set<string>();
  reportKinds = true;
  closeCount = 0;

  addFile(remotePath: string, data: Uint8Array, modifiedAt = new Date(0)): this {
    this.entries.set(remotePath, { kind: "file", data, modifiedAt });
    return this;
  }

  addDirectory(remotePath: string): this {
    this.entries.set(remotePath, { kind: "directory" });
    return this;
  }

  async listFiles(folder: string, extension?: string): Promise<RemoteFile[]> {
    const failure = this.failingLists.get(folder);
    if (failure) throw new Error(failure);

    const children: RemoteFile[] = [];
    for (const [remotePath, entry] of this.entries) {
      if (path.posix.dirname(remotePath) !== folder) continue;
      const name = path.posix.basename(remotePath);
      const file: RemoteFile = {
        name,
        path: remotePath,
        size: this.reportKinds && entry.kind === "file" ? entry.data.length : null,
        modifiedAt: null,
        kind: this.reportKinds ? entry.kind : "unknown",
      };
      if (extension && (file.kind === "directory" || !matchesExtension(name, extension))) {
        continue;
      }
      children.push(file);
    }
    return children;
  }

  async downloadFile(remotePath: string, localPath: string): Promise<void> {
    const entry = this.entries.get(remotePath);
    if (!entry || entry.kind !== "file") {
      throw new Error(`550 ${remotePath}: No such file`);
    }
    this.downloads.push(localPath);
    fs.writeFileSync(localPath, entry.data);
  }

  async getFileSize(remotePath: string): Promise<number> {
    const entry = this.entries.get(remotePath);
    if (!entry || entry.kind !== "file") {
      throw new Error(`550 ${remotePath}: Not a regular file`);
    }
    return entry.data.length;
  }

  async getFileDate(remotePath: string): Promise<Date> {
    const entry = this.entries.get(remotePath);
    if (!entry || entry.kind !== "file" || this.failingDates.has(remotePath)) {
      throw new Error(`550 ${remotePath}: No modification time`);
    }
    return entry.modifiedAt;
  }

  connector(): PrinterConnector {
    return async (): Promise<OpenConnection> => ({
      connection: this,
      close: () => {
        this.closeCount++;
      },
    });
  }
}

export function buildArchive(entries: Record<string, Uint8Array | string>): Uint8Array {
  const files: Record<string, Uint8Array> = {};
  for (const [name, content] of Object.entries(entries)) {
    files[name] = typeof content === "string" ? new TextEncoder().encode(content) : content;
  }
  return zipSync(files);
}

export function bytes(length: number, fill: number): Uint8Array {
  return new Uint8Array(length).fill(fill);
}

/**
 * Smallest byte sequence an image header reader accepts as a PNG: signature
 * plus an IHDR chunk carrying the dimensions.
 */
export function pngHeader(width: number, height: number): Uint8Array {
  const data = new Uint8Array(33);
  const view = new DataView(data.buffer);
  data.set([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], 0);
  view.setUint32(8, 13);
  data.set(new TextEncoder().encode("IHDR"), 12);
  view.setUint32(16, width);
  view.setUint32(20, height);
  data.set([8, 6, 0, 0, 0], 24);
  return data;
}

/**
 * Overwrite the first byte of `name`'s compressed data with 0xff, which a
 * deflate reader rejects as an invalid block type. Walks the local headers
 * of an archive written by `buildArchive`.
 */
export function corruptEntry(archive: Uint8Array, name: string): Uint8Array {
  const data = archive.slice();
  const view = new DataView(data.buffer);
  const decoder = new TextDecoder();
  let offset = 0;

  while (offset + 30 <= data.length && view.getUint32(offset, true) === 0x04034b50) {
    const compressedSize = view.getUint32(offset + 18, true);
    const nameLength = view.getUint16(offset + 26, true);
    const extraLength = view.getUint16(offset + 28, true);
    const entryName = decoder.decode(data.subarray(offset + 30, offset + 30 + nameLength));
    const start = offset + 30 + nameLength + extraLength;
    if (entryName === name) {
      data[start] = 0xff;
      return data;
    }
    offset = start + compressedSize;
  }
  throw new Error(`No entry ${name} in archive`);
}

const tempDirs: string[] = [];

export function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "printer-3mf-test-"));
  tempDirs.push(dir);
  return dir;
}

export function removeTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
