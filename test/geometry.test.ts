import { add, distance, fromAngle, offset, point, scale } from '../src/sim';

describe('geometry', () => {
  it('should add and scale points', () => {
    expect(add(point(1, 2), point(0.5, -1))).toEqual({ x: 1.5, y: 1 });
    expect(scale(point(1, -2), 0.5)).toEqual({ x: 0.5, y: -1 });
  });

  it('should compute the offset from one point to another', () => {
    expect(offset(point(1, 1), point(0.5, 3))).toEqual({ x: -0.5, y: 2 });
  });

  it('should compute euclidean distance', () => {
    expect(distance(point(0, 0), point(3, 4))).toBe(5);
    expect(distance(point(3, 4), point(0, 0))).toBe(5);
    expect(distance(point(0.2, 0.2), point(0.2, 0.2))).toBe(0);
  });

  it('should keep axis-aligned distances exact', () => {
    expect(distance(point(0.1, 0), point(0.1, 0.15))).toBe(0.15);
  });

  it('should build unit vectors from angles', () => {
    expect(fromAngle(0)).toEqual({ x: 1, y: 0 });
    const up = fromAngle(Math.PI / 2);
    expect(up.x).toBeCloseTo(0, 12);
    expect(up.y).toBeCloseTo(1, 12);
    const v = fromAngle(2.3);
    expect(Math.hypot(v.x, v.y)).toBeCloseTo(1, 12);
  });
});
