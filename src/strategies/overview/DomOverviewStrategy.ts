/**
 * DOM Overview Strategy
 *
 * 렌더링된 DOM에서 domSelectors 순서대로 조회,
 * 첫 번째 non-empty outerHTML 반환
 */

import type {
  IOverviewStrategy,
  OverviewCaptureContext,
} from "@/core/interfaces/IOverviewStrategy";
import { describeError } from "@/core/domain/ScrapeError";

export class DomOverviewStrategy implements IOverviewStrategy {
  readonly id = "dom" as const;

  async capture(context: OverviewCaptureContext): Promise<string | null> {
    const { controller, settings, logger } = context;

    for (const selector of settings.domSelectors) {
      try {
        const html = await controller.getOuterHtml(selector);
        if (html) {
          logger.info({ selector }, "DOM selector로 Overview 발견");
          return html;
        }
      } catch (error) {
        logger.debug(
          { selector, error: describeError(error) },
          "DOM selector 조회 실패 - 다음 selector 시도",
        );
      }
    }

    return null;
  }
}
