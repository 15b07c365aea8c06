// TypeScript type definitions for the 3MF inspector

export interface PrinterConfig {
  host: string;
  accessCode: string;
  connectionType: "lan";
  useLocalStorage: false;
  port: number;
  username: string;
  outputRoot: string;
}

/**
 * Everything that can go wrong in a procedure, one tag per external call site.
 */
export type FailureReason =
  | "config"
  | "connection"
  | "list"
  | "download"
  | "archive"
  | "write"
  | "decode";

export type OperationResult<T> =
  | { success: true; value: T }
  | { success: false; reason: FailureReason; error: string };

export function succeed<T>(value: T): OperationResult<T> {
  return { success: true, value };
}

export function fail<T = never>(
  reason: FailureReason,
  error: unknown,
): OperationResult<T> {
  return { success: false, reason, error: errorMessage(error) };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export type RemoteFileKind = "file" | "directory" | "unknown";

export interface RemoteFile {
  name: string;
  path: string;
  size: number | null;
  modifiedAt: Date | null;
  kind: RemoteFileKind;
}

export interface ArchiveEntryInfo {
  name: string;
  size: number;
  compressedSize: number;
}

export interface ArchiveContents {
  entries: ArchiveEntryInfo[];
  // Decompressed bytes of the selected entries only
  files: Map<string, Uint8Array>;
}

export interface DecodedImage {
  name: string;
  format: string;
  width: number;
  height: number;
  data: Uint8Array;
}
