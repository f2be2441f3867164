/**
 * Person detector client.
 *
 * The detector runs as a sidecar service: POST a JPEG to DETECTOR_URL and it
 * answers with the person detections it found:
 *
 *   { "detections": [{ "confidence": 0.91, "label": "person",
 *                      "bbox": { "x": 120, "y": 40, "width": 180, "height": 400 } }] }
 *
 * Coordinates are pixels in the submitted image, origin top-left.
 */

import { z } from 'zod';

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Detection {
  confidence: number;
  bbox: BoundingBox;
}

export interface Detector {
  detect(image: Buffer): Promise<Detection[]>;
}

const detectionSchema = z.object({
  confidence: z.number().min(0).max(1),
  label: z.string().optional(),
  bbox: z.object({
    x: z.number(),
    y: z.number(),
    width: z.number().nonnegative(),
    height: z.number().nonnegative(),
  }),
});

const responseSchema = z.object({
  detections: z.array(detectionSchema),
});

/**
 * The single highest-confidence detection at or above `minConfidence`, or null.
 * Boxes are never merged; on a tie the earlier detection wins.
 */
export function dominantDetection(detections: Detection[], minConfidence: number): Detection | null {
  let best: Detection | null = null;
  for (const d of detections) {
    if (d.confidence < minConfidence) continue;
    if (!best || d.confidence > best.confidence) best = d;
  }
  return best;
}

export class HttpDetector implements Detector {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number,
  ) {}

  async detect(image: Buffer): Promise<Detection[]> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'image/jpeg' },
        body: image,
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '(no body)');
        throw new Error(`Detector POST ${this.url} failed: ${res.status} ${res.statusText} -- ${body}`);
      }

      const parsed = responseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new Error(`Detector POST ${this.url} returned an invalid response: ${parsed.error.message}`);
      }

      // Non-person labels are ignored; a detector that omits labels only reports people
      return parsed.data.detections
        .filter((d) => d.label === undefined || d.label === 'person')
        .map((d) => ({ confidence: d.confidence, bbox: d.bbox }));
    } catch (err: unknown) {
      if (err instanceof DOMException && err.name === 'AbortError') {
        throw new Error(`Detector POST ${this.url} timed out after ${this.timeoutMs}ms`);
      }
      if (err instanceof Error && err.message.startsWith('Detector')) {
        throw err;
      }
      throw new Error(
        `Detector POST ${this.url} network error: ${err instanceof Error ? err.message : String(err)}`,
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
