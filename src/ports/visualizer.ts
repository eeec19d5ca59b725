import type { Sexp } from "../core/sexp";

/** 2D bit matrix, row-major. */
export type Bitmap = number[][];

/**
 * Visualizer port interface.
 * Renders a parsed design form; the designer stores the result at `/dev/draw`
 * and never reads it back.
 */
export interface Visualizer {
  render(expr: Sexp): Bitmap;
}
