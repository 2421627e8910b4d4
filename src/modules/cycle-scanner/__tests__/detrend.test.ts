import { detrendLogLinear } from '../detrend';

describe('detrendLogLinear', () => {
  it('returns exact zeros for a constant window', () => {
    expect(detrendLogLinear(new Array(50).fill(123.45))).toEqual(new Array(50).fill(0));
  });

  it('removes an exponential trend completely', () => {
    const prices = Array.from({ length: 200 }, (_, i) => Math.exp(0.5 + 0.01 * i));
    for (const r of detrendLogLinear(prices)) expect(Math.abs(r)).toBeLessThan(1e-9);
  });

  it('leaves residuals with zero mean and no correlation with the index', () => {
    const prices = Array.from({ length: 300 }, (_, i) => 50 * Math.exp(0.002 * i) * (1 + 0.1 * Math.sin(i / 7)));
    const residuals = detrendLogLinear(prices);

    expect(residuals).toHaveLength(300);
    const sum = residuals.reduce((s, r) => s + r, 0);
    const weighted = residuals.reduce((s, r, i) => s + r * i, 0);
    expect(Math.abs(sum)).toBeLessThan(1e-9);
    expect(Math.abs(weighted)).toBeLessThan(1e-6);
  });
});
