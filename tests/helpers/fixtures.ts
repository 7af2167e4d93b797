import type { Format, MediaChunk } from '../../src/shared/types/interfaces.js';

export const FORMAT_1080: Format = { id: 'D', bitrate: 4_000_000, width: 1920, height: 1080 };
export const FORMAT_720: Format = { id: 'A', bitrate: 2_000_000, width: 1280, height: 720 };
export const FORMAT_480: Format = { id: 'B', bitrate: 800_000, width: 854, height: 480 };
export const FORMAT_360: Format = { id: 'C', bitrate: 300_000, width: 640, height: 360 };

/** Ordered by decreasing bitrate, as evaluators expect */
export const LADDER: readonly Format[] = [FORMAT_720, FORMAT_480, FORMAT_360];
export const HD_LADDER: readonly Format[] = [FORMAT_1080, FORMAT_720, FORMAT_480, FORMAT_360];

export function chunk(format: Format, startMs: number, endMs: number): MediaChunk {
  return { format, startTimeUs: startMs * 1000, endTimeUs: endMs * 1000 };
}

/**
 * Back to back chunks of one format, starting at startMs
 */
export function queueOf(format: Format, count: number, chunkMs: number, startMs: number = 0): MediaChunk[] {
  const queue: MediaChunk[] = [];
  for (let i = 0; i < count; i++) {
    queue.push(chunk(format, startMs + i * chunkMs, startMs + (i + 1) * chunkMs));
  }
  return queue;
}
