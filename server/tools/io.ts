import type { ChalkInstance } from 'chalk';
import { readFile, stat } from 'fs/promises';
import type { Logger } from 'pino';
import type { AppConfig } from '../bootstrap/config.js';
import { IoError } from '../domain/errors.js';
import type { FormatRegistry } from '../formats/registry.js';

/**
 * Minimal sink the tools write to; process.stdout/stderr satisfy it
 */
export interface OutputSink {
  write(chunk: string | Uint8Array): unknown;
}

export interface ToolStreams {
  stdout: OutputSink;
  stderr: OutputSink;
}

/**
 * Everything a tool run needs from its host process
 */
export interface ToolContext {
  config: Pick<AppConfig, 'maxInputBytes'>;
  logger: Logger;
  streams: ToolStreams;
  paint: ChalkInstance;
  registry?: FormatRegistry;
}

function errnoMessage(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    switch (error.code) {
      case 'ENOENT':
        return 'file not found';
      case 'EACCES':
      case 'EPERM':
        return 'permission denied';
      case 'EISDIR':
        return 'is a directory';
      default:
        return `${error.code}: ${error.message}`;
    }
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read a whole input file, refusing anything above maxBytes
 */
export async function readInput(path: string, maxBytes: number): Promise<Buffer> {
  try {
    const info = await stat(path);
    if (info.isDirectory()) {
      throw new IoError(path, 'is a directory');
    }
    if (info.size > maxBytes) {
      throw new IoError(path, `file is ${info.size} bytes, limit is ${maxBytes}`);
    }
    return await readFile(path);
  } catch (error) {
    if (error instanceof IoError) {
      throw error;
    }
    throw new IoError(path, errnoMessage(error), error);
  }
}
