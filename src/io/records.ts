import { access } from 'node:fs/promises';
import path from 'node:path';

import { DateTime } from 'luxon';

import type { DecodedFrame } from '../codec/frame-codec.js';
import type { ExtractionResult } from '../extraction/run.js';
import { countFilledFields, type UserRecord } from '../parser/record.js';
import type { TagCounts } from '../parser/tags.js';
import { formatSegmentForFilename } from './dir.js';
import type { TargetExtras } from './targets.js';
import { upsertJsonl } from './upsertJsonl.js';
import { writeJsonAtomic } from './writeFileAtomic.js';

export type RecordFile = UserRecord & {
  readonly user_address: string;
  readonly fetched_at: string;
  readonly complete: boolean;
  readonly frames_processed: number;
  readonly tag_counts: TagCounts;
  readonly input: TargetExtras;
};

export type IndexEntry = {
  readonly user_address: string;
  readonly fetched_at: string;
  readonly complete: boolean;
  readonly frames_processed: number;
  readonly filled_fields: number;
  readonly file: string;
  readonly error?: string;
};

export interface RecordSink {
  exists(target: string): Promise<boolean>;
  write(file: RecordFile, error?: string): Promise<string>;
  dumpFrames(target: string, frames: readonly DecodedFrame[]): Promise<string | null>;
}

export type FileRecordSinkOptions = {
  readonly outputDir: string;
  /** `null` desactiva el volcado de frames. */
  readonly dumpsDir?: string | null;
};

export const INDEX_FILENAME = 'index.jsonl';

export function toRecordFile(
  result: ExtractionResult,
  extras: TargetExtras = {},
  fetchedAt: DateTime = DateTime.utc(),
): RecordFile {
  return {
    user_address: result.target,
    ...result.record,
    fetched_at: fetchedAt.toISO() ?? fetchedAt.toString(),
    complete: result.complete,
    frames_processed: result.framesProcessed,
    tag_counts: result.tagCounts,
    input: extras,
  };
}

export function recordOf(file: RecordFile): UserRecord {
  const {
    user_address: _address,
    fetched_at: _fetchedAt,
    complete: _complete,
    frames_processed: _framesProcessed,
    tag_counts: _tagCounts,
    input: _input,
    ...record
  } = file;
  return record;
}

/**
 * Un archivo `<target>.json` por registro, un índice `index.jsonl` con una
 * línea por objetivo y, opcionalmente, `<target>.frames.json` con los frames
 * decodificados para reproducirlos con `replay`.
 */
export class FileRecordSink implements RecordSink {
  readonly outputDir: string;
  readonly dumpsDir: string | null;

  constructor(options: FileRecordSinkOptions) {
    this.outputDir = options.outputDir;
    this.dumpsDir = options.dumpsDir ?? null;
  }

  recordPath(target: string): string {
    return path.join(this.outputDir, `${formatSegmentForFilename(target)}.json`);
  }

  dumpPath(target: string): string | null {
    return this.dumpsDir ? path.join(this.dumpsDir, `${formatSegmentForFilename(target)}.frames.json`) : null;
  }

  get indexPath(): string {
    return path.join(this.outputDir, INDEX_FILENAME);
  }

  async exists(target: string): Promise<boolean> {
    try {
      await access(this.recordPath(target));
      return true;
    } catch {
      return false;
    }
  }

  async write(file: RecordFile, error?: string): Promise<string> {
    const filePath = this.recordPath(file.user_address);
    await writeJsonAtomic(filePath, file);

    const entry: IndexEntry = {
      user_address: file.user_address,
      fetched_at: file.fetched_at,
      complete: file.complete,
      frames_processed: file.frames_processed,
      filled_fields: countFilledFields(recordOf(file)),
      file: path.basename(filePath),
      ...(error === undefined ? {} : { error }),
    };
    await upsertJsonl(this.indexPath, 'user_address', [entry]);
    return filePath;
  }

  async dumpFrames(target: string, frames: readonly DecodedFrame[]): Promise<string | null> {
    const filePath = this.dumpPath(target);
    if (!filePath) {
      return null;
    }
    await writeJsonAtomic(filePath, frames);
    return filePath;
  }
}
