export type Vec3 = [number, number, number];

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function dot(a: Vec3, b: Vec3) {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [a[1] * b[2] - a[2] * b[1], a[2] * b[0] - a[0] * b[2], a[0] * b[1] - a[1] * b[0]];
}

export function norm(a: Vec3) {
  return Math.sqrt(dot(a, a));
}

export function toVec3(values: readonly number[], offset = 0): Vec3 {
  if (values.length < offset + 3) {
    throw new RangeError(`Expected 3 components at offset ${offset}, got ${values.length - offset}`);
  }
  return [values[offset], values[offset + 1], values[offset + 2]];
}

/** Trapezoidal integral of uniformly spaced samples. */
export function trapezoid(values: readonly number[], dx: number) {
  let total = 0;
  for (let i = 1; i < values.length; i += 1) {
    total += ((values[i - 1] + values[i]) / 2) * dx;
  }
  return total;
}

export function roundTo(value: number, digits: number) {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
