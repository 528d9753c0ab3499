import { Vec3 } from "./Vec3";

/**
 * Ray - Ray utility class
 * A primary or secondary ray of the marcher; never persisted past one cast
 */
export class Ray {
  readonly origin: Vec3;
  readonly direction: Vec3; // Should be normalized

  constructor(origin: Vec3, direction: Vec3) {
    this.origin = origin;
    this.direction = direction;
  }

  /**
   * Get point at distance along ray
   * @param distance - Distance along ray
   */
  at(distance: number): Vec3 {
    return new Vec3(
      this.origin.x + this.direction.x * distance,
      this.origin.y + this.direction.y * distance,
      this.origin.z + this.direction.z * distance,
    );
  }

  /**
   * Intersect ray with plane
   * @param planeOrigin - Point on the plane
   * @param planeNormal - Normal vector of the plane (should be normalized)
   * @param epsilon - Rays with |direction·normal| at or below this count as parallel
   * @returns Distance along ray to intersection, or null if parallel/no intersection
   */
  intersectPlane(planeOrigin: Vec3, planeNormal: Vec3, epsilon: number = 1e-6): number | null {
    const denom = this.direction.dot(planeNormal);

    // Check if ray is parallel to plane
    if (Math.abs(denom) <= epsilon) {
      return null;
    }

    const t = planeOrigin.subtract(this.origin).dot(planeNormal) / denom;

    // Return null if intersection is at or behind ray origin
    if (t <= 0) {
      return null;
    }

    return t;
  }
}
