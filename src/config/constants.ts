/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 * - 사이트별 값은 YAML(config/sites)에서 관리, 여기는 전역 기본값만
 */

import * as path from "path";

/**
 * 애플리케이션 메타데이터 (로그 service 필드)
 */
export const APP_METADATA = {
  SERVICE: "product-overview-scraper",
} as const;

/**
 * 경로 설정
 */
export const PATH_CONFIG = {
  /**
   * 사이트 YAML 디렉토리
   * 환경변수: SITES_DIR
   * 기본값: <repo>/config/sites (src/config, dist/config 모두 동일 깊이)
   */
  SITES_DIR:
    process.env.SITES_DIR || path.resolve(__dirname, "..", "..", "config", "sites"),

  /**
   * 기본 사이트 ID (CLI 인자 생략 시)
   */
  DEFAULT_SITE: "unicorn",
} as const;

/**
 * 스크래퍼 기본값
 * YAML에 값이 없을 때 사용
 */
export const SCRAPER_CONFIG = {
  /**
   * 네비게이션 타임아웃 (ms)
   */
  NAVIGATION_TIMEOUT_MS: 30000,

  /**
   * waitForSelector 기본 타임아웃 (ms)
   */
  SELECTOR_TIMEOUT_MS: 30000,

  /**
   * Overview 탭 클릭 타임아웃 (ms)
   */
  CLICK_TIMEOUT_MS: 3000,

  /**
   * 탭 클릭 후 네트워크 응답 대기 (ms)
   */
  RESPONSE_WAIT_MS: 1400,

  /**
   * 추가 응답 대기(expect response) 타임아웃 (ms)
   */
  EXPECT_RESPONSE_TIMEOUT_MS: 30000,

  /**
   * 브라우저 기본 viewport
   */
  DEFAULT_VIEWPORT: {
    width: 1920,
    height: 1080,
  },
} as const;

/**
 * 출력 설정
 */
export const OUTPUT_CONFIG = {
  /**
   * 기본 출력 디렉토리
   */
  DEFAULT_DIR: "overview",

  /**
   * URL에서 slug를 얻지 못했을 때 사용할 이름
   */
  FALLBACK_SLUG: "product",

  /**
   * 출력 파일 확장자
   */
  EXTENSION: ".html",
} as const;
