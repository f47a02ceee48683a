/**
 * Element-wise u + v
 */
export function add(u: number[], v: number[]): number[] {
  return u.map((ui, i) => ui + v[i]);
}

/**
 * Element-wise u − v
 */
export function subtract(u: number[], v: number[]): number[] {
  return u.map((ui, i) => ui - v[i]);
}

export function scale(u: number[], k: number): number[] {
  return u.map(ui => ui * k);
}

export function dot(u: number[], v: number[]): number {
  return u.reduce((sum, ui, i) => sum + ui * v[i], 0);
}

/**
 * Euclidean norm ‖u‖₂
 */
export function norm(u: number[]): number {
  return Math.sqrt(dot(u, u));
}

/**
 * Mean of values
 */
export function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Population standard deviation (divides by n, not n − 1)
 */
export function standardDeviation(values: number[]): number {
  const m = mean(values);
  return Math.sqrt(values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length);
}

/**
 * Mean pairwise Euclidean distance between points.
 *
 * Sums ‖pᵢ − pⱼ‖ over ordered pairs i ≠ j and divides by n², so every
 * unordered pair counts twice and the diagonal counts as zero.
 */
export function meanPairwiseDistance(points: number[][]): number {
  const n = points.length;
  let sum = 0;
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      if (i !== j) sum += norm(subtract(points[i], points[j]));
    }
  }
  return sum / (n * n);
}

/**
 * Centroid of points (component-wise mean)
 */
export function centroid(points: number[][]): number[] {
  const n = points.length;
  const c: number[] = new Array(points[0].length).fill(0);
  for (const p of points) {
    for (let j = 0; j < c.length; j++) {
      c[j] += p[j] / n;
    }
  }
  return c;
}
