import { Injectable } from '../../shared/decorators';

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h ${minutes % 60}m`;
  if (hours > 0) return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  if (seconds > 0) return `${seconds}s`;
  return `${Math.max(0, Math.round(ms))}ms`;
}

@Injectable()
export class UptimeService {
  constructor(private readonly startTime: number = Date.now()) {}

  public getUptime(now: number = Date.now()): string {
    return formatDuration(now - this.startTime);
  }

  public getStartTime(): number {
    return this.startTime;
  }
}
