/**
 * Full Page Overview Strategy
 *
 * 최종 fallback: 현재 페이지 전체 HTML
 * 페이지 조회 실패 시 네비게이션 직후 스냅샷 사용
 */

import type {
  IOverviewStrategy,
  OverviewCaptureContext,
} from "@/core/interfaces/IOverviewStrategy";
import { describeError } from "@/core/domain/ScrapeError";

export class FullPageOverviewStrategy implements IOverviewStrategy {
  readonly id = "full_page" as const;

  async capture(context: OverviewCaptureContext): Promise<string | null> {
    const { controller, navigation, logger } = context;

    logger.warn(
      "network/DOM selector로 Overview를 찾지 못함 - 전체 페이지 HTML 사용",
    );

    try {
      return await controller.getContent();
    } catch (error) {
      logger.warn(
        { error: describeError(error) },
        "페이지 HTML 조회 실패 - 네비게이션 스냅샷 사용",
      );
      return navigation.html;
    }
  }
}
