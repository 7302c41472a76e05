/**
 * Grid topology over a linear index space
 *
 * `size` positions are laid out in the smallest hypercube of the given
 * dimension that holds them (size 38 in two dimensions is a 7x7 grid).
 * Coordinates are little-endian: axis 0 is `index mod extent`.
 */

/**
 * Smallest e with e^dimensions >= size
 */
export function hypercubeExtent(size: number, dimensions: number): number {
  if (size <= 0 || dimensions <= 0) return 0;
  let extent = Math.max(1, Math.ceil(Math.pow(size, 1 / dimensions)));
  while (extent > 1 && Math.pow(extent - 1, dimensions) >= size) extent--;
  while (Math.pow(extent, dimensions) < size) extent++;
  return extent;
}

export function toCoordinates(index: number, extent: number, dimensions: number): number[] {
  const coordinates: number[] = [];
  let rest = index;
  for (let axis = 0; axis < dimensions; axis++) {
    coordinates.push(rest % extent);
    rest = Math.floor(rest / extent);
  }
  return coordinates;
}

export function toIndex(coordinates: readonly number[], extent: number): number {
  let index = 0;
  for (let axis = coordinates.length - 1; axis >= 0; axis--) {
    index = index * extent + coordinates[axis];
  }
  return index;
}

/**
 * Linear indices within Euclidean distance `radius` of `index`, the index
 * itself included. Inputs are clamped: size >= 0, dimensions to [0, size],
 * index to [0, size - 1], radius >= 0.
 *
 * Offsets are enumerated with the highest axis varying slowest and each axis
 * running from -r to +r, so for a 10x10 grid the result around 50 with
 * radius 1.5 is [40, 41, 50, 51, 60, 61]. Positions outside the grid on any
 * axis, or past the last index, are dropped.
 *
 * Returns undefined as soon as more than `limit` positions are found.
 */
export function findNeighbors(
  size: number,
  dimensions: number,
  index: number,
  radius: number,
  limit = Infinity
): number[] | undefined {
  const n = Math.max(Math.trunc(size), 0);
  const dims = Math.max(Math.min(Math.trunc(dimensions), n), 0);
  const center = Math.max(Math.min(n - 1, Math.trunc(index)), 0);
  const r = Math.max(radius, 0);

  if (n === 0 || dims === 0 || Number.isNaN(r)) {
    return [];
  }

  const extent = hypercubeExtent(n, dims);
  // Axes whose stride reaches past the last index only ever hold 0
  let axes = 0;
  while (axes < dims && Math.pow(extent, axes) < n) axes++;
  const origin = toCoordinates(center, extent, axes);
  const reach = Math.min(Math.floor(r), extent - 1);
  const neighbors: number[] = [];

  // Highest axis first so it varies slowest. Offsets are bounded by the grid
  // and the remaining distance budget, and branches are cut once the partial
  // index reaches past the last position.
  let exceeded = false;
  const visit = (axis: number, partialIndex: number, budget: number): void => {
    if (axis < 0) {
      if (neighbors.length >= limit) {
        exceeded = true;
        return;
      }
      neighbors.push(partialIndex);
      return;
    }
    const stride = Math.pow(extent, axis);
    const step = Math.min(reach, Math.floor(Math.sqrt(budget)));
    const low = Math.max(-step, -origin[axis]);
    const high = Math.min(step, extent - 1 - origin[axis]);
    for (let d = low; d <= high && !exceeded; d++) {
      const remaining = budget - d * d;
      if (remaining < 0) continue;
      const index = partialIndex + (origin[axis] + d) * stride;
      if (index >= n) break;
      visit(axis - 1, index, remaining);
    }
  };
  visit(axes - 1, 0, r * r);

  return exceeded ? undefined : neighbors;
}
