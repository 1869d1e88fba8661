// src/render/rgbaImage.ts
export type Rgba = readonly [number, number, number, number];

export type RgbaImage = {
  width: number;
  height: number;
  data: Uint8Array; // length = width*height*4 (RGBA)
};

export function createImage(width: number, height: number, fill: Rgba = [0, 0, 0, 0]): RgbaImage {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`Invalid image size ${width}x${height}`);
  }
  const img = { width, height, data: new Uint8Array(width * height * 4) };
  fillRect(img, 0, 0, width, height, fill);
  return img;
}

/** Paints an opaque rectangle, clipped to the image. */
export function fillRect(
  img: RgbaImage,
  left: number,
  top: number,
  w: number,
  h: number,
  color: Rgba,
): void {
  const x0 = Math.max(0, left);
  const y0 = Math.max(0, top);
  const x1 = Math.min(img.width, left + w);
  const y1 = Math.min(img.height, top + h);

  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      img.data.set(color, (y * img.width + x) * 4);
    }
  }
}

export function pixelAt(img: RgbaImage, x: number, y: number): Rgba {
  if (x < 0 || y < 0 || x >= img.width || y >= img.height) {
    throw new Error(`pixelAt out of bounds: (${x},${y}) vs ${img.width}x${img.height}`);
  }
  const o = (y * img.width + x) * 4;
  const d = img.data;
  return [d[o]!, d[o + 1]!, d[o + 2]!, d[o + 3]!];
}
