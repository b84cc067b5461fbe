/**
 * Overview Strategy Interface
 *
 * Strategy Pattern: Overview HTML 확보 방식(network / dom / full_page)
 */

import type { Logger } from "@/config/logger";
import type { OverviewSettings, OverviewStrategyId } from "@/core/domain/SiteConfig";
import type {
  IBrowserController,
  NavigationResult,
} from "@/scrapers/controllers/IBrowserController";

/**
 * 전략 실행 컨텍스트 (URL 1건)
 */
export interface OverviewCaptureContext {
  /** 요청 URL */
  url: string;
  /** 초기화 + 네비게이션 완료된 Controller */
  controller: IBrowserController;
  /** 네비게이션 결과 (직후 HTML 스냅샷 포함) */
  navigation: NavigationResult;
  /** 사이트 Overview 설정 */
  settings: OverviewSettings;
  /** URL 컨텍스트 로거 */
  logger: Logger;
}

/**
 * Overview Strategy
 */
export interface IOverviewStrategy {
  readonly id: OverviewStrategyId;

  /**
   * Overview HTML 확보 시도
   * @returns HTML (못 찾으면 null 또는 빈 문자열)
   */
  capture(context: OverviewCaptureContext): Promise<string | null>;
}
