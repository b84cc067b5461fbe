/**
 * Overview Scrape Service
 *
 * URL 단위 흐름:
 * 1. allowedDomains 확인 (offsite → 스킵)
 * 2. 브라우저 초기화 + 네비게이션
 * 3. 전략 체인으로 Overview HTML 확보
 * 4. 브라우저 정리 (항상)
 * 5. outputDir/{slug}_{unix초}.html 저장
 *
 * run()은 URL을 순차 처리, URL 1건의 치명적 실패는 기록 후 다음 URL 진행
 */

import type { Logger } from "@/config/logger";
import type { SiteConfig } from "@/core/domain/SiteConfig";
import type {
  OverviewCaptureResult,
  ScrapeOutcome,
  ScrapeRunSummary,
} from "@/core/domain/OverviewCapture";
import type { IOverviewStrategy } from "@/core/interfaces/IOverviewStrategy";
import { ScrapeError, describeError } from "@/core/domain/ScrapeError";
import { BrowserController } from "@/scrapers/controllers/BrowserController";
import type {
  BrowserControllerFactory,
  NavigationResult,
} from "@/scrapers/controllers/IBrowserController";
import { createOverviewStrategies } from "@/strategies/overview";
import { OverviewExtractService } from "@/services/OverviewExtractService";
import { isAllowedDomain } from "@/utils/DomainFilter";
import { makeSafeFilename } from "@/utils/SafeFilename";
import { OverviewFileWriter } from "@/utils/OverviewFileWriter";
import { RateLimiter } from "@/utils/RateLimiter";
import {
  createSiteLogger,
  createUrlLogger,
  logImportant,
} from "@/utils/LoggerContext";

/**
 * 의존성 주입 옵션 (테스트에서 교체)
 */
export interface OverviewScrapeServiceDeps {
  controllerFactory?: BrowserControllerFactory;
  strategies?: readonly IOverviewStrategy[];
  writer?: OverviewFileWriter;
  rateLimiter?: RateLimiter;
  now?: () => number;
}

export class OverviewScrapeService {
  private readonly logger: Logger;
  private readonly controllerFactory: BrowserControllerFactory;
  private readonly extractService: OverviewExtractService;
  private readonly writer: OverviewFileWriter;
  private readonly rateLimiter: RateLimiter;
  private readonly now: () => number;

  constructor(
    private readonly config: SiteConfig,
    deps: OverviewScrapeServiceDeps = {},
  ) {
    this.logger = createSiteLogger(config.site);
    this.controllerFactory =
      deps.controllerFactory ?? (() => new BrowserController());
    this.extractService = new OverviewExtractService(
      deps.strategies ?? createOverviewStrategies(config.overview.strategies),
    );
    this.writer = deps.writer ?? new OverviewFileWriter();
    this.rateLimiter = deps.rateLimiter ?? new RateLimiter(config.requestDelay);
    this.now = deps.now ?? Date.now;
  }

  /**
   * URL 목록 순차 스크래핑 (기본: YAML startUrls)
   */
  async run(
    urls: readonly string[] = this.config.startUrls,
  ): Promise<ScrapeRunSummary> {
    const summary: ScrapeRunSummary = {
      site: this.config.site,
      items: [],
      skipped: [],
      failed: [],
    };

    logImportant(this.logger, "Overview 스크래핑 시작", {
      urls: urls.length,
      strategies: this.extractService.getStrategyIds(),
      requestDelayMs: this.rateLimiter.getWaitTime(),
    });

    for (const url of urls) {
      await this.rateLimiter.throttle(url);

      try {
        const outcome = await this.scrapeUrl(url);
        if (outcome.status === "saved") {
          summary.items.push(outcome.item);
        } else {
          summary.skipped.push(outcome.skipped);
        }
      } catch (error) {
        const details =
          error instanceof ScrapeError
            ? error.toLogObject()
            : { error: describeError(error) };
        this.logger.error({ ...details, url }, "URL 스크래핑 실패");
        summary.failed.push({ url, error: describeError(error) });
      }
    }

    logImportant(this.logger, "Overview 스크래핑 종료", {
      saved: summary.items.length,
      skipped: summary.skipped.length,
      failed: summary.failed.length,
    });

    return summary;
  }

  /**
   * URL 1건 스크래핑 + 저장
   */
  async scrapeUrl(url: string): Promise<ScrapeOutcome> {
    const urlLogger = createUrlLogger(this.logger, url);

    if (!isAllowedDomain(url, this.config.allowedDomains)) {
      const reason = `offsite URL (allowedDomains: ${this.config.allowedDomains.join(", ")})`;
      urlLogger.warn({ reason }, "allowedDomains 밖 URL - 스킵");
      return { status: "skipped", skipped: { url, reason } };
    }

    const { navigation, capture } = await this.captureWithBrowser(
      url,
      urlLogger,
    );

    // 리다이렉트 반영 (about:blank 등 http(s)가 아니면 요청 URL 사용)
    const filenameUrl = /^https?:\/\//i.test(navigation.finalUrl)
      ? navigation.finalUrl
      : url;
    const filename = makeSafeFilename(filenameUrl, {
      fallbackSlug: this.config.output.fallbackSlug,
      nowMs: this.now(),
    });

    const written = await this.writer.write(
      this.config.output.dir,
      filename,
      capture.html,
    );

    logImportant(urlLogger, "Overview HTML 저장 완료", {
      file: written.filepath,
      source: capture.source,
      bytes: written.bytes,
    });

    return {
      status: "saved",
      item: {
        url,
        file: written.filepath,
        source: capture.source,
        bytes: written.bytes,
      },
    };
  }

  /**
   * 브라우저 생명주기 안에서 네비게이션 + 전략 체인 실행
   * 성공/실패와 무관하게 cleanup
   */
  private async captureWithBrowser(
    url: string,
    urlLogger: Logger,
  ): Promise<{ navigation: NavigationResult; capture: OverviewCaptureResult }> {
    const controller = this.controllerFactory();

    try {
      await controller.initialize(this.config.browser);

      const navigation = await controller.navigate(
        url,
        this.config.navigationSteps,
      );
      urlLogger.debug(
        {
          success: navigation.success,
          status: navigation.status,
          finalUrl: navigation.finalUrl,
        },
        "네비게이션 완료",
      );

      const capture = await this.extractService.extract({
        url,
        controller,
        navigation,
        settings: this.config.overview,
        logger: urlLogger,
      });

      return { navigation, capture };
    } finally {
      try {
        await controller.cleanup();
      } catch (cleanupError) {
        urlLogger.warn(
          { error: describeError(cleanupError) },
          "브라우저 정리 실패",
        );
      }
    }
  }
}
