import fs from 'node:fs';
import path from 'node:path';
import { StateChannelUnavailableError, ValidationError, toError } from '../errors.js';
import {
  controlFilePath,
  parseControlDocument,
  parseStatusDocument,
  statusFilePath,
  type ControlDocument,
  type StatusDocument
} from './documents.js';

export interface SnapshotChannel<T> {
  readonly filePath: string;
  publish(document: T): void;
  read(): T | null;
}

let tempCounter = 0;

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Whole-document JSON snapshot kept in a single file. Writers replace the file
 * through a rename so readers observe either the previous or the next snapshot.
 * Last writer wins.
 */
export class FileSnapshotChannel<T> implements SnapshotChannel<T> {
  readonly filePath: string;

  constructor(
    filePath: string,
    private readonly parse: (value: unknown) => T
  ) {
    this.filePath = path.resolve(filePath);
  }

  publish(document: T) {
    tempCounter += 1;
    const tempPath = `${this.filePath}.${process.pid}.${tempCounter}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      if (fs.existsSync(tempPath)) {
        fs.rmSync(tempPath, { force: true });
      }
      throw new StateChannelUnavailableError(
        `Failed to publish ${path.basename(this.filePath)}: ${toError(error).message}`,
        this.filePath,
        error
      );
    }
  }

  /** Returns null when the snapshot is absent or unreadable as a whole document. */
  read(): T | null {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw new StateChannelUnavailableError(
        `Failed to read ${path.basename(this.filePath)}: ${toError(error).message}`,
        this.filePath,
        error
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      if (error instanceof SyntaxError) {
        return null;
      }
      throw error;
    }

    try {
      return this.parse(parsed);
    } catch (error) {
      if (error instanceof ValidationError) {
        return null;
      }
      throw error;
    }
  }
}

export function createControlChannel(artifactDir: string): SnapshotChannel<ControlDocument> {
  return new FileSnapshotChannel(controlFilePath(artifactDir), parseControlDocument);
}

export function createStatusChannel(artifactDir: string): SnapshotChannel<StatusDocument> {
  return new FileSnapshotChannel(statusFilePath(artifactDir), parseStatusDocument);
}
