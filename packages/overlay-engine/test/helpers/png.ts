/** Signature and IHDR header of a PNG with the given size; enough for the surface to decode. */
export function pngHeader(width: number, height: number): Uint8Array {
  const bytes = new Uint8Array(33);
  bytes.set([137, 80, 78, 71, 13, 10, 26, 10], 0);
  bytes.set([0, 0, 0, 13], 8);
  bytes.set([73, 72, 68, 82], 12);
  bytes.set([0, 0, (width >> 8) & 0xff, width & 0xff], 16);
  bytes.set([0, 0, (height >> 8) & 0xff, height & 0xff], 20);
  return bytes;
}
