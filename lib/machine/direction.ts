/**
 * Head movement directions and their tokens in the machine text format.
 *
 * @module
 */

export enum Direction {
  Left = "<",
  Right = ">",
  Halt = "-",
}

const DIRECTIONS: readonly Direction[] = [
  Direction.Left,
  Direction.Right,
  Direction.Halt,
];

export function parseDirection(token: string): Direction | undefined {
  return DIRECTIONS.find((direction) => direction === token);
}

export function headOffset(direction: Direction): number {
  switch (direction) {
    case Direction.Left:
      return -1;
    case Direction.Right:
      return 1;
    case Direction.Halt:
      return 0;
  }
}
