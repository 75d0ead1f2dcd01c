export type Point = {
  x: number;
  y: number;
};

export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type RgbaColor = {
  r: number;
  g: number;
  b: number;
  a: number;
};
