/**
 * Scrape Error
 *
 * 목적:
 * - 전략 fallback으로 흡수할 수 없는 구조적 실패 표현
 * - 에러 타입별 로깅
 *
 * 전략 단계 실패(selector 없음, 타임아웃, 응답 읽기 실패)는
 * 이 에러를 쓰지 않고 다음 전략으로 넘어감
 */

/**
 * Scrape 에러 타입
 */
export enum ScrapeErrorType {
  /** 사이트 YAML 없음 */
  CONFIG_NOT_FOUND = "CONFIG_NOT_FOUND",

  /** 사이트 YAML 스키마 검증 실패 */
  CONFIG_INVALID = "CONFIG_INVALID",

  /** 브라우저 실행/컨텍스트 생성 실패 */
  BROWSER_ERROR = "BROWSER_ERROR",

  /** 결과 파일 저장 실패 */
  WRITE_FAILED = "WRITE_FAILED",
}

/**
 * Scrape Error 클래스
 */
export class ScrapeError extends Error {
  public readonly type: ScrapeErrorType;
  public readonly site?: string;
  public readonly url?: string;
  public readonly errorCause?: unknown;

  constructor(
    type: ScrapeErrorType,
    message: string,
    options?: {
      site?: string;
      url?: string;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = "ScrapeError";
    this.type = type;
    this.site = options?.site;
    this.url = options?.url;
    this.errorCause = options?.cause;
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      message: this.message,
      site: this.site,
      url: this.url,
      cause:
        this.errorCause === undefined
          ? undefined
          : describeError(this.errorCause),
    };
  }
}

/**
 * unknown 에러 → 메시지 문자열
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
