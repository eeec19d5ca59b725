// src/core/namespace/paths.ts
// Well-known namespace locations

export const SOURCE_PATH = "/form/source.scm";
export const MANIFEST_PATH = "/form/manifest.json";
export const LAST_MESSAGE_PATH = "/last/msg.path";
export const DRAW_PATH = "/dev/draw";

export function kernelPath(symbol: string): string {
  return `/form/${symbol}.kernel`;
}
