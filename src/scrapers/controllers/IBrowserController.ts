/**
 * Browser Controller Interface
 *
 * 브라우저 생명주기 및 페이지 조작 인터페이스
 *
 * SOLID 원칙:
 * - SRP: 브라우저 제어만 담당 (Overview 판별/저장 X)
 * - ISP: Overview 전략에 필요한 조작만 노출
 * - DIP: 전략/서비스는 Playwright가 아닌 이 인터페이스에 의존
 */

import type { BrowserSettings, NavigationStep } from "@/core/domain/SiteConfig";

/**
 * 네트워크 응답 스냅샷
 * Playwright Response에서 전략이 쓰는 부분만 추린 형태
 */
export interface ResponseSnapshot {
  /** 응답 URL */
  url: string;
  /** content-type 헤더 (없으면 빈 문자열) */
  contentType: string;
  /** 응답 본문 읽기 (리다이렉트 등은 실패할 수 있음) */
  text(): Promise<string>;
}

export type ResponseListener = (response: ResponseSnapshot) => void;

export type ResponsePredicate = (response: ResponseSnapshot) => boolean;

/**
 * 네비게이션 결과
 */
export interface NavigationResult {
  /** goto + 스텝 모두 성공 여부 */
  success: boolean;
  /** 최종 URL (리다이렉트 반영) */
  finalUrl: string;
  /** 메인 문서 HTTP 상태 (응답 없으면 null) */
  status: number | null;
  /** 네비게이션 스텝 직후 페이지 HTML */
  html: string;
  /** 실패 메시지 */
  error?: string;
}

/**
 * Browser Controller Interface
 */
export interface IBrowserController {
  /**
   * 브라우저/컨텍스트/페이지 생성
   */
  initialize(settings: BrowserSettings): Promise<void>;

  /**
   * URL 이동 후 네비게이션 스텝 실행
   * 실패해도 throw 하지 않음 (success=false)
   */
  navigate(url: string, steps: NavigationStep[]): Promise<NavigationResult>;

  /**
   * 응답 리스너 등록
   * @returns 리스너 해제 함수
   */
  onResponse(listener: ResponseListener): () => void;

  /**
   * 요소 클릭 (실패 시 throw)
   */
  click(selector: string, timeoutMs: number): Promise<void>;

  /**
   * 고정 시간 대기
   */
  waitForTimeout(ms: number): Promise<void>;

  /**
   * 조건에 맞는 응답 대기
   * 대기 시작 후 trigger 실행 (클릭 등)
   * 타임아웃 시 throw
   */
  waitForResponse(
    predicate: ResponsePredicate,
    trigger: () => Promise<void>,
    timeoutMs: number,
  ): Promise<ResponseSnapshot>;

  /**
   * selector 첫 매칭 요소의 outerHTML (없으면 null)
   */
  getOuterHtml(selector: string): Promise<string | null>;

  /**
   * 현재 페이지 전체 HTML
   */
  getContent(): Promise<string>;

  /**
   * 리소스 정리 (중복 호출 안전)
   */
  cleanup(): Promise<void>;
}

/**
 * Controller 생성 함수 (URL마다 새 브라우저)
 */
export type BrowserControllerFactory = () => IBrowserController;
