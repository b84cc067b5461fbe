/**
 * Rate Limiter Utility
 *
 * 연속된 start URL 사이 최소 간격 보장 (YAML requestDelay)
 */

import { logger } from "@/config/logger";

/**
 * Rate Limiter
 */
export class RateLimiter {
  private lastExecutionTime: number | null = null;

  constructor(
    private readonly waitTimeMs: number,
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Rate limiting 적용 (필요시 대기)
   * 첫 호출은 대기하지 않음
   */
  async throttle(context?: string): Promise<void> {
    if (this.lastExecutionTime !== null && this.waitTimeMs > 0) {
      const elapsed = this.now() - this.lastExecutionTime;

      if (elapsed < this.waitTimeMs) {
        const waitTime = this.waitTimeMs - elapsed;
        logger.debug({ wait_time_ms: waitTime, context }, "Rate limiting 대기");
        await this.sleep(waitTime);
      }
    }

    this.lastExecutionTime = this.now();
  }

  /**
   * 현재 설정 조회
   */
  getWaitTime(): number {
    return this.waitTimeMs;
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
