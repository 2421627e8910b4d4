/**
 * Log-transforms `prices` and subtracts the least-squares line fitted over the
 * bar index. A window with identical log-prices yields exact zeros.
 *
 * Callers pass at least two positive prices.
 */
export function detrendLogLinear(prices: readonly number[]): number[] {
  const n = prices.length;
  const logs = prices.map((p) => Math.log(p));
  if (logs.every((v) => v === logs[0])) return new Array<number>(n).fill(0);

  let sumX = 0, sumY = 0, sumXX = 0, sumXY = 0;
  for (let i = 0; i < n; i++) {
    sumX += i;
    sumY += logs[i];
    sumXX += i * i;
    sumXY += i * logs[i];
  }

  const slope = (n * sumXY - sumX * sumY) / (n * sumXX - sumX * sumX);
  const intercept = (sumY - slope * sumX) / n;

  return logs.map((y, i) => y - (intercept + slope * i));
}
