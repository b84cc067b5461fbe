/**
 * Browser Controller 구현체
 *
 * 브라우저 생명주기 및 페이지 조작 관리
 *
 * SOLID 원칙:
 * - SRP: 브라우저 제어만 담당 (Overview 판별/저장 X)
 * - LSP: IBrowserController 대체 가능
 * - DIP: 전략은 인터페이스에만 의존
 *
 * 책임:
 * 1. 브라우저/컨텍스트/페이지 생명주기 관리
 * 2. 네비게이션 + 네비게이션 스텝 실행
 * 3. 응답 리스너 / 응답 대기
 * 4. 클릭, DOM 조회
 */

import { chromium, firefox, webkit } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import type { Browser, BrowserContext, Page, Response } from "playwright";

import type {
  IBrowserController,
  NavigationResult,
  ResponseListener,
  ResponsePredicate,
  ResponseSnapshot,
} from "./IBrowserController";
import type { BrowserSettings, NavigationStep } from "@/core/domain/SiteConfig";
import {
  ScrapeError,
  ScrapeErrorType,
  describeError,
} from "@/core/domain/ScrapeError";
import { resolveDefaultBrowserArgs } from "@/config/BrowserArgs";
import { SCRAPER_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";

// Stealth 플러그인 적용 (모듈 레벨, chromium 전용)
chromium.use(StealthPlugin());

const LAUNCHERS = { chromium, firefox, webkit } as const;

/**
 * Playwright Response → ResponseSnapshot
 */
function toSnapshot(response: Response): ResponseSnapshot {
  return {
    url: response.url(),
    contentType: response.headers()["content-type"] ?? "",
    text: () => response.text(),
  };
}

/**
 * Browser Controller 구현체
 */
export class BrowserController implements IBrowserController {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private settings: BrowserSettings | null = null;
  private _initialized: boolean = false;

  /**
   * 브라우저 초기화
   */
  async initialize(settings: BrowserSettings): Promise<void> {
    if (this._initialized) {
      logger.debug("BrowserController 이미 초기화됨");
      return;
    }

    this.settings = settings;
    logger.info(
      { browserType: settings.browserType, headless: settings.headless },
      "브라우저 초기화 시작",
    );

    try {
      const launcher = LAUNCHERS[settings.browserType];
      this.browser = await launcher.launch({
        headless: settings.headless,
        args:
          settings.browserType === "chromium"
            ? settings.args ?? resolveDefaultBrowserArgs()
            : settings.args,
      });

      this.context = await this.browser.newContext({
        viewport: settings.viewport ?? SCRAPER_CONFIG.DEFAULT_VIEWPORT,
        userAgent: settings.userAgent,
        locale: settings.locale,
      });

      // Anti-detection 설정
      await this.context.addInitScript(() => {
        Object.defineProperty(navigator, "webdriver", {
          get: () => false,
        });
      });

      this.page = await this.context.newPage();
      this.page.setDefaultNavigationTimeout(settings.navigationTimeout);
    } catch (error) {
      await this.cleanup();
      throw new ScrapeError(
        ScrapeErrorType.BROWSER_ERROR,
        `브라우저 초기화 실패: ${describeError(error)}`,
        { cause: error },
      );
    }

    this._initialized = true;
    logger.info({ browserType: settings.browserType }, "브라우저 초기화 완료");
  }

  /**
   * URL 이동 + 네비게이션 스텝 실행
   *
   * goto 실패(타임아웃 등)는 로그만 남기고 현재 페이지 상태로 계속 진행
   */
  async navigate(
    url: string,
    steps: NavigationStep[],
  ): Promise<NavigationResult> {
    const page = this.requirePage();
    const settings = this.settings;
    let success = true;
    let status: number | null = null;
    let error: string | undefined;

    try {
      logger.info({ url }, "페이지 이동");
      const response = await page.goto(url, {
        waitUntil: settings?.waitUntil ?? "load",
        timeout: settings?.navigationTimeout ?? SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS,
      });
      status = response ? response.status() : null;
    } catch (gotoError) {
      success = false;
      error = describeError(gotoError);
      logger.warn({ url, error }, "페이지 이동 실패 - 현재 페이지로 계속 진행");
    }

    if (success) {
      for (const step of steps) {
        try {
          await this.executeStep(page, step);
        } catch (stepError) {
          success = false;
          error = describeError(stepError);
          logger.warn(
            { url, action: step.action, error },
            "네비게이션 스텝 실패 - 계속 진행",
          );
        }
      }
    }

    let html = "";
    try {
      html = await page.content();
    } catch (contentError) {
      logger.warn(
        { url, error: describeError(contentError) },
        "네비게이션 직후 HTML 조회 실패",
      );
    }

    return {
      success,
      finalUrl: page.url(),
      status,
      html,
      error,
    };
  }

  /**
   * 응답 리스너 등록
   */
  onResponse(listener: ResponseListener): () => void {
    const page = this.requirePage();

    const handler = (response: Response): void => {
      try {
        listener(toSnapshot(response));
      } catch (listenerError) {
        logger.debug(
          { url: response.url(), error: describeError(listenerError) },
          "응답 리스너 에러 (무시)",
        );
      }
    };

    page.on("response", handler);
    return () => {
      page.off("response", handler);
    };
  }

  /**
   * 요소 클릭
   */
  async click(selector: string, timeoutMs: number): Promise<void> {
    await this.requirePage().click(selector, { timeout: timeoutMs });
  }

  /**
   * 고정 시간 대기
   */
  async waitForTimeout(ms: number): Promise<void> {
    await this.requirePage().waitForTimeout(ms);
  }

  /**
   * 조건에 맞는 응답 대기 (대기 등록 → trigger 실행)
   */
  async waitForResponse(
    predicate: ResponsePredicate,
    trigger: () => Promise<void>,
    timeoutMs: number,
  ): Promise<ResponseSnapshot> {
    const page = this.requirePage();
    const [response] = await Promise.all([
      page.waitForResponse((r) => predicate(toSnapshot(r)), {
        timeout: timeoutMs,
      }),
      trigger(),
    ]);
    return toSnapshot(response);
  }

  /**
   * selector 첫 매칭 요소의 outerHTML
   */
  async getOuterHtml(selector: string): Promise<string | null> {
    const locator = this.requirePage().locator(selector).first();
    if ((await locator.count()) === 0) {
      return null;
    }
    return locator.evaluate((el) => el.outerHTML);
  }

  /**
   * 현재 페이지 전체 HTML
   */
  async getContent(): Promise<string> {
    return this.requirePage().content();
  }

  /**
   * 리소스 정리
   * page → context → browser 순서, 개별 실패는 로그만
   */
  async cleanup(): Promise<void> {
    const targets: Array<[string, { close(): Promise<void> } | null]> = [
      ["page", this.page],
      ["context", this.context],
      ["browser", this.browser],
    ];

    for (const [name, target] of targets) {
      if (!target) continue;
      try {
        await target.close();
      } catch (error) {
        logger.warn(
          { target: name, error: describeError(error) },
          "브라우저 리소스 정리 실패",
        );
      }
    }

    this.page = null;
    this.context = null;
    this.browser = null;
    this._initialized = false;
    logger.debug("BrowserController 정리 완료");
  }

  /**
   * 네비게이션 스텝 1건 실행
   */
  private async executeStep(page: Page, step: NavigationStep): Promise<void> {
    switch (step.action) {
      case "waitForSelector":
        logger.debug(
          { selector: step.selector, description: step.description },
          "selector 대기 중",
        );
        await page.waitForSelector(step.selector, {
          timeout: step.timeout ?? SCRAPER_CONFIG.SELECTOR_TIMEOUT_MS,
        });
        break;

      case "wait":
        logger.debug({ waitTimeMs: step.duration }, "대기 중");
        await page.waitForTimeout(step.duration);
        break;
    }
  }

  /**
   * 초기화된 Page 반환 (없으면 throw)
   */
  private requirePage(): Page {
    if (!this.page) {
      throw new Error("BrowserController가 초기화되지 않음");
    }
    return this.page;
  }
}
