import { describe, it, expect } from 'vitest';
import { Vec3 } from './math/Vec3';
import { fresnel, fresnelComponents, reflect, refract } from './optics';

const UP = new Vec3(0, 1, 0);

describe('optics', () => {
  describe('reflect', () => {
    it('should mirror the normal component', () => {
      const result = reflect(new Vec3(0.6, -0.8, 0), UP);
      expect(result.equals(new Vec3(0.6, 0.8, 0))).toBe(true);
    });

    it('should be an involution for an axis-aligned normal', () => {
      const incident = new Vec3(0.6, -0.8, 0);
      const twice = reflect(reflect(incident, UP), UP);
      expect(twice.equals(incident)).toBe(true);
    });

    it('should return the incident direction after two reflections on an oblique normal', () => {
      const incident = new Vec3(1, -2, 3).normalize();
      const normal = new Vec3(1, 1, 1).normalize();
      const twice = reflect(reflect(incident, normal), normal);
      expect(twice.equalsApprox(incident, 1e-12)).toBe(true);
    });
  });

  describe('fresnel', () => {
    it('should return exactly 1 under total internal reflection', () => {
      // leaving glass at 60 degrees: sin(t) = 1.5 * sin(60) > 1
      const incident = new Vec3(Math.sqrt(3) / 2, 0.5, 0);
      expect(fresnel(incident, UP, 1.5)).toBe(1);
      expect(fresnelComponents(incident, UP, 1.5)).toBeNull();
    });

    it('should give equal Rs and Rp at normal incidence', () => {
      const components = fresnelComponents(new Vec3(0, -1, 0), UP, 1.5);
      expect(components).not.toBeNull();
      expect(components!.rs).toBeCloseTo(0.2, 12);
      expect(components!.rp).toBeCloseTo(-0.2, 12);
      expect(components!.rs * components!.rs).toBeCloseTo(components!.rp * components!.rp, 12);
      expect(fresnel(new Vec3(0, -1, 0), UP, 1.5)).toBeCloseTo(0.04, 12);
    });

    it('should stay within [0, 1] at oblique incidence', () => {
      const kr = fresnel(new Vec3(1, -1, 0).normalize(), UP, 1.5);
      expect(kr).toBeGreaterThan(0);
      expect(kr).toBeLessThan(1);
    });

    it('should clamp a cosine that drifts past -1', () => {
      const incident = new Vec3(0, -1.0000001, 0);
      expect(fresnel(incident, UP, 1.5)).toBeCloseTo(0.04, 12);
    });

    it('should report no reflection between equal indices', () => {
      expect(fresnel(new Vec3(1, -2, 0).normalize(), UP, 1)).toBeCloseTo(0, 12);
    });
  });

  describe('refract', () => {
    it('should not bend a ray entering a medium of equal index', () => {
      const incident = new Vec3(1, -2, 0.5).normalize();
      expect(refract(incident, UP, 1, 1).equalsApprox(incident, 1e-12)).toBe(true);
    });

    it('should not bend a ray leaving a medium of equal index', () => {
      const incident = new Vec3(1, 2, 0.5).normalize();
      expect(refract(incident, UP, 1, 1).equalsApprox(incident, 1e-12)).toBe(true);
    });

    it('should pass straight through at normal incidence', () => {
      const result = refract(new Vec3(0, -1, 0), UP, 1.5);
      expect(result.equalsApprox(new Vec3(0, -1, 0), 1e-12)).toBe(true);
    });

    it('should bend toward the normal when entering glass', () => {
      const incident = new Vec3(1, -1, 0).normalize();
      const result = refract(incident, UP, 1.5);
      // Snell: sin(t) = sin(45) / 1.5
      expect(result.x).toBeCloseTo(Math.SQRT1_2 / 1.5, 12);
      expect(result.length()).toBeCloseTo(1, 12);
    });

    it('should return the (1, 0, 0) placeholder under total internal reflection', () => {
      const incident = new Vec3(Math.sqrt(3) / 2, 0.5, 0);
      expect(refract(incident, UP, 1.5).equals(new Vec3(1, 0, 0))).toBe(true);
    });
  });
});
