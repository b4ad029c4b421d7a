import type { FrameBuffer } from './frame.js';

/**
 * Encode an RGBA frame as a binary (P6) PPM image. Alpha is dropped.
 */
export function encodePpm(frame: FrameBuffer): Uint8Array {
  const header = new TextEncoder().encode(`P6\n${frame.width} ${frame.height}\n255\n`);
  const pixelCount = frame.width * frame.height;
  const output = new Uint8Array(header.length + pixelCount * 3);

  output.set(header, 0);
  let offset = header.length;
  for (let i = 0; i < pixelCount; i++) {
    output[offset++] = frame.data[i * 4];
    output[offset++] = frame.data[i * 4 + 1];
    output[offset++] = frame.data[i * 4 + 2];
  }

  return output;
}
