import type {Equatable, Hashable} from '../types';

export class Point implements Equatable, Hashable {
  constructor(
    readonly x: number,
    readonly y: number,
  ) {}

  equals(other: unknown): boolean {
    return other instanceof Point && other.x === this.x && other.y === this.y;
  }

  hashCode(): number {
    return 31 * this.x + this.y;
  }
}

/** Equal to any `Point` with the same coordinates, but hashes by instance. */
export class InstanceHashPoint extends Point {
  private static next = 1;

  private readonly id = InstanceHashPoint.next++;

  hashCode(): number {
    return this.id;
  }
}

/** Claims equality with everything. */
export class Greedy implements Equatable, Hashable {
  equals(): boolean {
    return true;
  }

  hashCode(): number {
    return 0;
  }
}

/** Unequal to anything but itself, with a constant hash. */
export class Colliding implements Equatable, Hashable {
  constructor(readonly value: number) {}

  equals(other: unknown): boolean {
    return other === this;
  }

  hashCode(): number {
    return 7;
  }
}
