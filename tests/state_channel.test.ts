import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createControlChannel,
  createStatusChannel,
  FileSnapshotChannel
} from '../src/channel/fileChannel.js';
import {
  CONTROL_FILE_NAME,
  parseControlDocument,
  statusAgeMs,
  type ControlDocument,
  type StatusDocument
} from '../src/channel/documents.js';
import { StateChannelUnavailableError } from '../src/errors.js';
import { baseParameters, makeTempDir } from './helpers/fixtures.js';

const controlDocument: ControlDocument = {
  version: 1,
  revision: 3,
  writeId: 'writer-a',
  session: { phase: 'phase1', startedAt: '2026-03-01T08:00:00.000Z', intervalSeconds: 15, watchActive: true },
  overrides: { CONFIRM_N: 2 },
  updatedAt: '2026-03-01T08:00:05.000Z'
};

function statusDocument(publishedAt: string): StatusDocument {
  return {
    version: 1,
    publishedAt,
    controlRevision: 3,
    session: null,
    parameters: baseParameters(),
    lastOutcome: {
      kind: 'candidate',
      reason: 'candidate',
      windowId: 12,
      timestamp: 12000,
      primaryScore: 0.9,
      babyScore: 0.9,
      catScore: 0.1,
      margin: 0.8,
      persistedCount: 1
    },
    alertsSuppressed: false,
    blockedBy: 'none'
  };
}

describe('FileSnapshotChannel', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir('lullwatch-channel-');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('reads back the whole document it published', () => {
    const channel = createControlChannel(tempDir);

    channel.publish(controlDocument);

    expect(channel.read()).toEqual(controlDocument);
    expect(fs.readdirSync(tempDir)).toEqual([CONTROL_FILE_NAME]);
  });

  it('returns null when the document does not exist yet', () => {
    expect(createStatusChannel(tempDir).read()).toBeNull();
  });

  it('returns null for a torn or foreign document', () => {
    const channel = createControlChannel(tempDir);
    fs.writeFileSync(channel.filePath, '{"version":1,"revision":', 'utf-8');
    expect(channel.read()).toBeNull();

    fs.writeFileSync(channel.filePath, JSON.stringify({ version: 1, revision: 'two' }), 'utf-8');
    expect(channel.read()).toBeNull();

    const { writeId: _writeId, ...anonymous } = controlDocument;
    fs.writeFileSync(channel.filePath, JSON.stringify(anonymous), 'utf-8');
    expect(channel.read()).toBeNull();
  });

  it('creates the artifact directory on first publish', () => {
    const nested = path.join(tempDir, 'nested', 'artifacts');
    const channel = createStatusChannel(nested);

    channel.publish(statusDocument('2026-03-01T08:00:00.000Z'));

    expect(channel.read()?.lastOutcome?.windowId).toBe(12);
  });

  it('wraps unreadable files in StateChannelUnavailableError', () => {
    const channel = new FileSnapshotChannel(tempDir, parseControlDocument);

    expect(() => channel.read()).toThrow(StateChannelUnavailableError);
  });

  it('reports a failed publish and leaves no temp file behind', () => {
    const blocker = path.join(tempDir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory', 'utf-8');
    const channel = createControlChannel(path.join(blocker, 'artifacts'));

    expect(() => channel.publish(controlDocument)).toThrow(StateChannelUnavailableError);
    expect(fs.readdirSync(tempDir)).toEqual(['blocker']);
  });
});

describe('channel documents', () => {
  it('drops overrides the session phase does not own', () => {
    const parsed = parseControlDocument({ ...controlDocument, overrides: { CONFIRM_N: 2, CAT_WEIGHT: 3 } });

    expect(parsed.overrides).toEqual({ CONFIRM_N: 2 });
  });

  it('measures the age of a status snapshot', () => {
    const document = statusDocument('2026-03-01T08:00:00.000Z');

    expect(statusAgeMs(document, Date.parse('2026-03-01T08:00:04.500Z'))).toBe(4500);
    expect(statusAgeMs({ ...document, publishedAt: 'yesterday' }, 0)).toBeNull();
  });
});
