import type { Vec3Tuple } from '../../types';

/**
 * Vec3 - 3D Vector utility class
 * Used for points, directions and RGB colors throughout the marcher
 */
export class Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;

  constructor(x: number = 0, y: number = 0, z: number = 0) {
    this.x = x;
    this.y = y;
    this.z = z;
  }

  // Factory methods
  static fromArray(arr: Float32Array | readonly number[], offset: number = 0): Vec3 {
    return new Vec3(arr[offset], arr[offset + 1], arr[offset + 2]);
  }

  static zero(): Vec3 {
    return new Vec3(0, 0, 0);
  }

  static one(): Vec3 {
    return new Vec3(1, 1, 1);
  }

  // Basic operations (return new Vec3)
  add(v: Vec3): Vec3 {
    return new Vec3(this.x + v.x, this.y + v.y, this.z + v.z);
  }

  subtract(v: Vec3): Vec3 {
    return new Vec3(this.x - v.x, this.y - v.y, this.z - v.z);
  }

  multiply(scalar: number): Vec3 {
    return new Vec3(this.x * scalar, this.y * scalar, this.z * scalar);
  }

  negate(): Vec3 {
    return new Vec3(-this.x, -this.y, -this.z);
  }

  // Vector operations
  dot(v: Vec3): number {
    return this.x * v.x + this.y * v.y + this.z * v.z;
  }

  length(): number {
    return Math.sqrt(this.x * this.x + this.y * this.y + this.z * this.z);
  }

  distance(v: Vec3): number {
    const dx = this.x - v.x;
    const dy = this.y - v.y;
    const dz = this.z - v.z;
    return Math.sqrt(dx * dx + dy * dy + dz * dz);
  }

  /**
   * Largest of the three components (used for color normalization)
   */
  maxComponent(): number {
    return Math.max(this.x, this.y, this.z);
  }

  // Normalization
  normalize(): Vec3 {
    const len = this.length();
    if (len < 1e-10) {
      // Handle zero-length vector - return default direction
      return new Vec3(0, 0, 1);
    }
    return new Vec3(this.x / len, this.y / len, this.z / len);
  }

  // Utility
  toArray(): Vec3Tuple {
    return [this.x, this.y, this.z];
  }

  /**
   * Check if this vector equals another vector
   */
  equals(v: Vec3): boolean {
    return this.x === v.x && this.y === v.y && this.z === v.z;
  }

  /**
   * Check if this vector approximately equals another vector
   */
  equalsApprox(v: Vec3, epsilon: number = 1e-6): boolean {
    return (
      Math.abs(this.x - v.x) < epsilon &&
      Math.abs(this.y - v.y) < epsilon &&
      Math.abs(this.z - v.z) < epsilon
    );
  }
}
