/**
 * Overview 캡처 도메인 타입
 */

import type { OverviewStrategyId } from "./SiteConfig";

/**
 * Overview HTML 출처
 * - network: 탭 클릭 시 수신된 HTML fragment 응답
 * - dom: 렌더링된 DOM selector 추출
 * - full_page: 전체 페이지 HTML
 * - empty: 모든 전략 실패 (빈 파일 저장)
 */
export type OverviewSource = OverviewStrategyId | "empty";

/**
 * 전략 체인 실행 결과
 */
export interface OverviewCaptureResult {
  html: string;
  source: OverviewSource;
}

/**
 * URL 1건 스크래핑 결과 (저장 완료)
 */
export interface ScrapeItem {
  url: string;
  /** 저장 경로 (outputDir/파일명) */
  file: string;
  source: OverviewSource;
  /** UTF-8 바이트 수 */
  bytes: number;
}

/**
 * allowedDomains 밖이라 스킵된 URL
 */
export interface SkippedUrl {
  url: string;
  reason: string;
}

/**
 * 치명적 실패 (브라우저 실행 실패, 파일 저장 실패 등)
 */
export interface FailedUrl {
  url: string;
  error: string;
}

export type ScrapeOutcome =
  | { status: "saved"; item: ScrapeItem }
  | { status: "skipped"; skipped: SkippedUrl };

/**
 * 실행(run) 요약
 */
export interface ScrapeRunSummary {
  site: string;
  items: ScrapeItem[];
  skipped: SkippedUrl[];
  failed: FailedUrl[];
}
