/**
 * Network Overview Strategy
 *
 * 목적:
 * - Overview 탭 클릭 시 받아오는 HTML fragment 응답을 그대로 캡처
 *
 * 흐름:
 * 1. response 리스너 등록 (후보 응답 수집)
 * 2. Overview 탭 클릭 (tabSelectors 순서대로 시도)
 * 3. responseWait 만큼 대기
 * 4. 후보 응답을 최신순으로 읽기
 * 5. 아무것도 못 읽었으면 응답 1건 추가 대기 (클릭 실패 시 클릭을 trigger로)
 * 6. 리스너 해제 (항상)
 */

import type { Logger } from "@/config/logger";
import type {
  IOverviewStrategy,
  OverviewCaptureContext,
} from "@/core/interfaces/IOverviewStrategy";
import type { OverviewSettings } from "@/core/domain/SiteConfig";
import { describeError } from "@/core/domain/ScrapeError";
import type {
  IBrowserController,
  ResponseSnapshot,
} from "@/scrapers/controllers/IBrowserController";
import { isOverviewCandidate } from "@/utils/ResponseMatcher";

export class NetworkOverviewStrategy implements IOverviewStrategy {
  readonly id = "network" as const;

  async capture(context: OverviewCaptureContext): Promise<string | null> {
    const { controller, settings, logger } = context;
    const candidates: ResponseSnapshot[] = [];
    const matches = (response: ResponseSnapshot): boolean =>
      isOverviewCandidate(response, settings.responseMatch);

    const detach = controller.onResponse((response) => {
      if (matches(response)) {
        candidates.push(response);
        logger.info({ responseUrl: response.url }, "[listener] 후보 응답 캡처");
      }
    });

    try {
      const clickedSelector = await this.clickOverviewTab(
        controller,
        settings,
        logger,
      );

      // 네트워크 응답 도착 대기
      await controller.waitForTimeout(settings.responseWait);

      const captured = await this.readNewestCandidate(candidates, logger);
      if (captured) {
        return captured;
      }

      return await this.expectResponse(
        controller,
        settings,
        clickedSelector !== null,
        matches,
        logger,
      );
    } finally {
      detach();
    }
  }

  /**
   * Overview 탭 클릭
   * @returns 클릭 성공한 selector (모두 실패 시 null)
   */
  private async clickOverviewTab(
    controller: IBrowserController,
    settings: OverviewSettings,
    logger: Logger,
  ): Promise<string | null> {
    for (const selector of settings.tabSelectors) {
      try {
        await controller.click(selector, settings.clickTimeout);
        logger.debug({ selector }, "Overview 탭 클릭 성공");
        return selector;
      } catch (error) {
        logger.debug(
          { selector, error: describeError(error) },
          "Overview 탭 클릭 실패 - 다음 selector 시도",
        );
      }
    }

    logger.info("Overview 탭 클릭 실패 (모든 selector) - 계속 진행");
    return null;
  }

  /**
   * 후보 응답 최신순 읽기
   * 첫 번째 non-empty 본문 반환
   */
  private async readNewestCandidate(
    candidates: ResponseSnapshot[],
    logger: Logger,
  ): Promise<string | null> {
    // 읽는 도중 도착하는 응답은 제외 (스냅샷)
    const snapshot = [...candidates].reverse();

    for (const response of snapshot) {
      try {
        const html = await response.text();
        if (html) {
          logger.info(
            { responseUrl: response.url },
            "응답에서 Overview HTML 캡처",
          );
          return html;
        }
      } catch (error) {
        logger.warn(
          { responseUrl: response.url, error: describeError(error) },
          "응답 본문 읽기 실패",
        );
      }
    }

    return null;
  }

  /**
   * 응답 1건 추가 대기
   * 앞서 클릭에 실패했으면 첫 번째 탭 selector 클릭을 trigger로 사용
   */
  private async expectResponse(
    controller: IBrowserController,
    settings: OverviewSettings,
    clicked: boolean,
    matches: (response: ResponseSnapshot) => boolean,
    logger: Logger,
  ): Promise<string | null> {
    const [firstSelector] = settings.tabSelectors;

    const trigger = async (): Promise<void> => {
      if (clicked || !firstSelector) return;
      try {
        await controller.click(firstSelector, settings.clickTimeout);
      } catch (error) {
        logger.debug(
          { selector: firstSelector, error: describeError(error) },
          "[expect_response] 탭 재클릭 실패 (무시)",
        );
      }
    };

    try {
      const response = await controller.waitForResponse(
        matches,
        trigger,
        settings.expectResponseTimeout,
      );
      const html = await response.text();
      logger.info(
        { responseUrl: response.url },
        "[expect_response] Overview HTML 캡처",
      );
      return html;
    } catch (error) {
      logger.debug(
        { error: describeError(error) },
        "[expect_response] 응답 캡처 실패",
      );
      return null;
    }
  }
}
