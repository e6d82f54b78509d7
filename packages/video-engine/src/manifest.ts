/** ffconcat list: every frame with its display time, then the last frame again without one
 * (the concat demuxer ignores the final entry's duration otherwise). */
export function buildConcatManifest(framePaths: string[], durationPerFrame: number): string {
  const lines: string[] = [];
  for (const path of framePaths) {
    lines.push(`file '${escapeConcatPath(path)}'`);
    lines.push(`duration ${durationPerFrame}`);
  }
  const last = framePaths[framePaths.length - 1];
  if (last !== undefined) {
    lines.push(`file '${escapeConcatPath(last)}'`);
  }
  return lines.map((l) => `${l}\n`).join('');
}

export function escapeConcatPath(path: string): string {
  return path.replace(/'/g, "'\\''");
}
