/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 로거 생성 헬퍼 함수
 * Site, URL, Strategy 추적 지원
 */

import { logger, Logger } from "@/config/logger";

/**
 * 사이트 실행(run) 전용 로거 생성
 * @param site - 사이트 ID (YAML 파일명)
 */
export function createSiteLogger(site: string): Logger {
  return logger.child({ site });
}

/**
 * URL 단위 스크래핑 로거 생성
 * @param parent - 상위 로거 (보통 site 로거)
 * @param url - 대상 URL
 */
export function createUrlLogger(parent: Logger, url: string): Logger {
  return parent.child({ url });
}

/**
 * Strategy 전용 로거 생성
 * @param parent - 상위 로거 (보통 URL 로거)
 * @param strategy - Overview 전략 ID
 */
export function createStrategyLogger(parent: Logger, strategy: string): Logger {
  return parent.child({ strategy });
}

/**
 * 중요 정보 로깅 (콘솔에 ⭐ 표시)
 */
export function logImportant(
  target: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  target.info({ ...data, important: true }, message);
}
