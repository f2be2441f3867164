/**
 * Frame dissimilarity as 1 - SSIM.
 *
 * Frames are decoded with sharp, converted to grayscale and resized to a fixed
 * working size, then scored as the mean structural similarity over every 7x7
 * window. Window statistics come from summed-area tables so the cost is linear
 * in the pixel count.
 *
 * Frames whose pixel dimensions differ score 1 (maximally different): a
 * resolution change usually means the camera restarted or was reconfigured.
 */

import sharp from 'sharp';
import { FrameDecodeError } from '../utils/errors.js';

export type FrameDifferenceFn = (a: Buffer, b: Buffer) => Promise<number>;

const WORK_WIDTH = 320;
const WORK_HEIGHT = 240;
const WINDOW = 7;

// Stabilising constants for 8-bit data (K1 = 0.01, K2 = 0.03)
const C1 = (0.01 * 255) ** 2;
const C2 = (0.03 * 255) ** 2;

interface Dimensions {
  width: number;
  height: number;
}

async function readDimensions(image: Buffer, label: string): Promise<Dimensions> {
  let meta: sharp.Metadata;
  try {
    meta = await sharp(image).metadata();
  } catch (err) {
    throw new FrameDecodeError(`Cannot decode ${label} frame: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  if (!meta.width || !meta.height) {
    throw new FrameDecodeError(`Cannot decode ${label} frame: missing dimensions`);
  }
  return { width: meta.width, height: meta.height };
}

/** Grayscale pixels at the working size, one byte per pixel. */
async function toWorkingGray(image: Buffer, label: string): Promise<Uint8Array> {
  try {
    const { data, info } = await sharp(image)
      .grayscale()
      .resize(WORK_WIDTH, WORK_HEIGHT, { fit: 'fill' })
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels === 1) return data;

    // An alpha channel survives grayscale(); keep the luminance channel only
    const gray = new Uint8Array(WORK_WIDTH * WORK_HEIGHT);
    for (let i = 0; i < gray.length; i++) {
      gray[i] = data[i * info.channels];
    }
    return gray;
  } catch (err) {
    throw new FrameDecodeError(`Cannot decode ${label} frame: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
}

/** Summed-area tables of x, y, x^2, y^2 and xy with a zero top row and left column. */
function integrals(x: Uint8Array, y: Uint8Array, width: number, height: number) {
  const stride = width + 1;
  const size = stride * (height + 1);
  const sx = new Float64Array(size);
  const sy = new Float64Array(size);
  const sxx = new Float64Array(size);
  const syy = new Float64Array(size);
  const sxy = new Float64Array(size);

  for (let r = 0; r < height; r++) {
    for (let c = 0; c < width; c++) {
      const vx = x[r * width + c];
      const vy = y[r * width + c];
      const i = (r + 1) * stride + (c + 1);
      const up = r * stride + (c + 1);
      const left = (r + 1) * stride + c;
      const diag = r * stride + c;
      sx[i] = vx + sx[up] + sx[left] - sx[diag];
      sy[i] = vy + sy[up] + sy[left] - sy[diag];
      sxx[i] = vx * vx + sxx[up] + sxx[left] - sxx[diag];
      syy[i] = vy * vy + syy[up] + syy[left] - syy[diag];
      sxy[i] = vx * vy + sxy[up] + sxy[left] - sxy[diag];
    }
  }
  return { stride, sx, sy, sxx, syy, sxy };
}

/** Mean SSIM over all fully contained WINDOW x WINDOW windows. */
export function meanSsim(x: Uint8Array, y: Uint8Array, width: number, height: number): number {
  const { stride, sx, sy, sxx, syy, sxy } = integrals(x, y, width, height);
  const n = WINDOW * WINDOW;
  const sampleCorrection = n / (n - 1);

  let total = 0;
  let windows = 0;
  for (let r = 0; r + WINDOW <= height; r++) {
    for (let c = 0; c + WINDOW <= width; c++) {
      const a = r * stride + c;
      const b = r * stride + c + WINDOW;
      const d = (r + WINDOW) * stride + c;
      const e = (r + WINDOW) * stride + c + WINDOW;
      const box = (t: Float64Array) => t[e] - t[b] - t[d] + t[a];

      const mx = box(sx) / n;
      const my = box(sy) / n;
      const vx = (box(sxx) / n - mx * mx) * sampleCorrection;
      const vy = (box(syy) / n - my * my) * sampleCorrection;
      const cov = (box(sxy) / n - mx * my) * sampleCorrection;

      total += ((2 * mx * my + C1) * (2 * cov + C2)) / ((mx * mx + my * my + C1) * (vx + vy + C2));
      windows++;
    }
  }
  return windows === 0 ? 1 : total / windows;
}

/**
 * Dissimilarity of two frames in [0, 1]. 0 means identical.
 * Throws FrameDecodeError when either buffer is not a decodable image.
 */
export async function frameDifference(a: Buffer, b: Buffer): Promise<number> {
  const [dimA, dimB] = await Promise.all([readDimensions(a, 'current'), readDimensions(b, 'previous')]);
  if (dimA.width !== dimB.width || dimA.height !== dimB.height) {
    return 1;
  }

  const [grayA, grayB] = await Promise.all([toWorkingGray(a, 'current'), toWorkingGray(b, 'previous')]);
  const score = 1 - meanSsim(grayA, grayB, WORK_WIDTH, WORK_HEIGHT);
  return Math.min(1, Math.max(0, score));
}
