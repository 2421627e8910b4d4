import { UptimeService, formatDuration } from '../services/uptime.service';

describe('formatDuration', () => {
  it.each([
    [250, '250ms'],
    [42_000, '42s'],
    [125_000, '2m 5s'],
    [3_725_000, '1h 2m 5s'],
    [90_061_000, '1d 1h 1m'],
  ])('%i ms -> %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});

describe('UptimeService', () => {
  it('measures from its start time', () => {
    const uptime = new UptimeService(1_000);
    expect(uptime.getStartTime()).toBe(1_000);
    expect(uptime.getUptime(61_000)).toBe('1m 0s');
  });
});
