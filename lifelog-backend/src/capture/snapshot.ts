/**
 * Camera snapshot client: one JPEG per call from the camera's snapshot URL.
 */

import type { CameraConfig } from '../config.js';

export interface SnapshotSource {
  fetch(camera: CameraConfig): Promise<Buffer>;
}

export class HttpSnapshotSource implements SnapshotSource {
  constructor(private readonly timeoutMs: number) {}

  async fetch(camera: CameraConfig): Promise<Buffer> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(camera.snapshotUrl, {
        method: 'GET',
        signal: controller.signal,
      });

      if (!res.ok) {
        throw new Error(`Snapshot GET ${camera.id} failed: ${res.status} ${res.statusText}`);
      }

      const frame = Buffer.from(await res.arrayBuffer());
      if (frame.length === 0) {
        throw new Error(`Snapshot GET ${camera.id} returned an empty body`);
      }
      return frame;
    } catch (err: unknown) {
      if (err instanceof DOMException && err.name === 'AbortError') {
        throw new Error(`Snapshot GET ${camera.id} timed out after ${this.timeoutMs}ms`);
      }
      if (err instanceof Error && err.message.startsWith('Snapshot')) {
        throw err;
      }
      throw new Error(
        `Snapshot GET ${camera.id} network error: ${err instanceof Error ? err.message : String(err)}`,
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
