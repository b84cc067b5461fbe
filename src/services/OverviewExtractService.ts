/**
 * Overview Extract Service
 *
 * 전략 체인 실행 (Chain of Responsibility)
 * - 설정된 순서대로 전략 실행
 * - 첫 번째 non-empty HTML 채택
 * - 전략 내부 예외는 로그 후 다음 전략으로
 * - 모두 실패 시 빈 HTML (source: "empty")
 */

import type {
  IOverviewStrategy,
  OverviewCaptureContext,
} from "@/core/interfaces/IOverviewStrategy";
import type { OverviewCaptureResult } from "@/core/domain/OverviewCapture";
import type { OverviewStrategyId } from "@/core/domain/SiteConfig";
import { describeError } from "@/core/domain/ScrapeError";
import { createStrategyLogger } from "@/utils/LoggerContext";

export class OverviewExtractService {
  constructor(private readonly strategies: readonly IOverviewStrategy[]) {}

  async extract(context: OverviewCaptureContext): Promise<OverviewCaptureResult> {
    for (const strategy of this.strategies) {
      const strategyLogger = createStrategyLogger(context.logger, strategy.id);

      try {
        const html = await strategy.capture({
          ...context,
          logger: strategyLogger,
        });

        if (html) {
          strategyLogger.debug({ length: html.length }, "Overview 확보");
          return { html, source: strategy.id };
        }

        strategyLogger.debug("Overview 없음 - 다음 전략");
      } catch (error) {
        strategyLogger.warn(
          { error: describeError(error) },
          "전략 실행 중 예외 - 다음 전략",
        );
      }
    }

    context.logger.warn("모든 전략 실패 - 빈 HTML 저장");
    return { html: "", source: "empty" };
  }

  /**
   * 실행 순서 (전략 ID)
   */
  getStrategyIds(): OverviewStrategyId[] {
    return this.strategies.map((s) => s.id);
  }
}
