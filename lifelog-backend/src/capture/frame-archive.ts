import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileStamp } from '../utils/dates.js';

export interface FrameArchive {
  /** Persist a frame and return its path. */
  save(cameraId: string, frame: Buffer, capturedAt: Date): Promise<string>;
}

/** Frames on disk as `<camera>_<yyyyMMdd_HHmmss>.jpg`. */
export class DiskFrameArchive implements FrameArchive {
  constructor(
    private readonly dir: string,
    private readonly timeZone: string,
  ) {}

  async save(cameraId: string, frame: Buffer, capturedAt: Date): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const path = join(this.dir, `${cameraId}_${fileStamp(capturedAt, this.timeZone)}.jpg`);
    await writeFile(path, frame);
    return path;
  }
}
