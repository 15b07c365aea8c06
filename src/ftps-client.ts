/**
 * Printer FTPS access
 *
 * The printer exposes its SD card over implicit FTPS on port 990. The login is
 * the fixed LAN user with the printer's access code as password, and the
 * certificate is self-signed, so it is accepted without verification.
 */

import { Client as FTPClient, type FileInfo } from "basic-ftp";
import * as path from "path";
import {
  fail,
  succeed,
  type OperationResult,
  type PrinterConfig,
  type RemoteFile,
  type RemoteFileKind,
} from "./types.js";

/**
 * Connection handle used by every procedure. Tests substitute an in-memory
 * implementation.
 */
export interface PrinterFileSystem {
  listFiles(folder: string, extension?: string): Promise<RemoteFile[]>;
  downloadFile(remotePath: string, localPath: string): Promise<void>;
  getFileSize(remotePath: string): Promise<number>;
  getFileDate(remotePath: string): Promise<Date>;
}

export interface OpenConnection {
  connection: PrinterFileSystem;
  close(): void;
}

export type PrinterConnector = (config: PrinterConfig) => Promise<OpenConnection>;

// The slice of basic-ftp's client the connection uses
export type FTPSession = Pick<FTPClient, "list" | "downloadTo" | "size" | "lastMod">;

// ===== Path helpers =====

export function joinRemotePath(folder: string, name: string): string {
  return path.posix.join("/", folder, name);
}

export function matchesExtension(name: string, extension?: string): boolean {
  if (!extension) return true;
  return name.toLowerCase().endsWith(extension.toLowerCase());
}

// ===== basic-ftp implementation =====

function kindOf(info: FileInfo): RemoteFileKind {
  if (info.isDirectory) return "directory";
  if (info.isFile) return "file";
  return "unknown";
}

export class PrinterFTPSConnection implements PrinterFileSystem {
  private client: FTPSession;

  constructor(client: FTPSession) {
    this.client = client;
  }

  async listFiles(folder: string, extension?: string): Promise<RemoteFile[]> {
    const listing = await this.client.list(folder);
    return listing
      .filter((info) => info.name !== "." && info.name !== "..")
      .map((info) => ({
        name: info.name,
        path: joinRemotePath(folder, info.name),
        size: info.isFile ? info.size : null,
        modifiedAt: info.modifiedAt ?? null,
        kind: kindOf(info),
      }))
      .filter(
        (file) =>
          !extension ||
          (file.kind !== "directory" && matchesExtension(file.name, extension)),
      );
  }

  async downloadFile(remotePath: string, localPath: string): Promise<void> {
    await this.client.downloadTo(localPath, remotePath);
  }

  async getFileSize(remotePath: string): Promise<number> {
    return this.client.size(remotePath);
  }

  async getFileDate(remotePath: string): Promise<Date> {
    return this.client.lastMod(remotePath);
  }
}

export const connectFTPS: PrinterConnector = async (config) => {
  const ftp = new FTPClient();
  ftp.ftp.verbose = false;

  try {
    await ftp.access({
      host: config.host,
      port: config.port,
      user: config.username,
      password: config.accessCode,
      secure: "implicit",
      secureOptions: { rejectUnauthorized: false },
    });
  } catch (error) {
    ftp.close();
    throw error;
  }

  return {
    connection: new PrinterFTPSConnection(ftp),
    close: () => ftp.close(),
  };
};

// ===== Scoped connection =====

/**
 * Open a connection, run `fn` against it and close it on every exit path.
 * Only a failure to connect is reported here; `fn` owns its own failures.
 */
export async function withPrinterConnection<T>(
  config: PrinterConfig,
  fn: (connection: PrinterFileSystem) => Promise<T>,
  connector: PrinterConnector = connectFTPS,
): Promise<OperationResult<T>> {
  let open: OpenConnection;
  try {
    open = await connector(config);
  } catch (error) {
    return fail("connection", error);
  }

  try {
    return succeed(await fn(open.connection));
  } finally {
    open.close();
  }
}
