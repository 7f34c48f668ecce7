/** A position in device (pixel) space; y grows downward. */
export type Point = {
  x: number;
  y: number;
};
