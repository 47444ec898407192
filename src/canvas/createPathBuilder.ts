import type { Path, PathCommand, Point } from './types';

export interface PathBuilder {
  moveTo(point: Point): PathBuilder;
  lineTo(point: Point): PathBuilder;
  /** Adds the implicit edge back to the start of the current sub-path. */
  close(): PathBuilder;
  build(): Path;
}

/**
 * Accumulates path commands. Points are copied so later changes to the
 * caller's objects never leak into a built path.
 */
export function createPathBuilder(): PathBuilder {
  const commands: PathCommand[] = [];

  const builder: PathBuilder = {
    moveTo(point) {
      commands.push({ type: 'move', point: { x: point.x, y: point.y } });
      return builder;
    },
    lineTo(point) {
      commands.push({ type: 'line', point: { x: point.x, y: point.y } });
      return builder;
    },
    close() {
      commands.push({ type: 'close' });
      return builder;
    },
    build() {
      return commands.slice();
    },
  };

  return builder;
}

/**
 * Returns the vertices of a path in order, ignoring `close` commands.
 */
export function pathVertices(path: Path): Point[] {
  const out: Point[] = [];
  for (const cmd of path) {
    if (cmd.type !== 'close') out.push(cmd.point);
  }
  return out;
}
