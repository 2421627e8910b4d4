export function clamp(x: number, a: number, b: number) {
  return Math.max(a, Math.min(b, x));
}

export function mean(arr: readonly number[]) {
  if (!arr.length) return 0;
  return arr.reduce((s, n) => s + n, 0) / arr.length;
}

export function gaussianWeight(offset: number, sigma: number) {
  return Math.exp((-0.5 * offset * offset) / (sigma * sigma));
}

export type Neighbor = { offset: number; value: number };

// in-bounds neighbours of values[center] within ±halfWindow; out-of-range positions are omitted, not padded
export function neighborhood(values: readonly number[], center: number, halfWindow: number): Neighbor[] {
  const out: Neighbor[] = [];
  for (let offset = -halfWindow; offset <= halfWindow; offset++) {
    const idx = center + offset;
    if (idx >= 0 && idx < values.length) out.push({ offset, value: values[idx] });
  }
  return out;
}

/** Weighted mean normalised by the weights actually present. */
export function weightedAverage(neighbors: readonly Neighbor[], weight: (offset: number) => number) {
  let sum = 0;
  let total = 0;
  for (const { offset, value } of neighbors) {
    const w = weight(offset);
    sum += value * w;
    total += w;
  }
  return total > 0 ? sum / total : 0;
}

/** Upper median: element floor(n/2) of the sorted values. */
export function median(values: readonly number[]) {
  if (!values.length) return 0;
  const sorted = values.slice().sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}
