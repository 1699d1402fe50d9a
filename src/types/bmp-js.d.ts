/// <reference types="node" />

// bmp-js ships no type declarations and has no @types package.
declare module 'bmp-js' {
  interface BmpImage {
    width: number;
    height: number;
    /** 4 bytes per pixel in A, B, G, R order, rows top to bottom */
    data: Buffer;
  }

  function decode(buffer: Buffer): BmpImage;
  function encode(image: BmpImage, quality?: number): { data: Buffer; width: number; height: number };

  const bmp: { decode: typeof decode; encode: typeof encode };
  export = bmp;
}
