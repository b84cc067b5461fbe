/**
 * CLI 인자 파싱
 *
 * 사용법:
 *   scrape-overview [site] [url ...] [--json]
 *
 * - http(s):// 로 시작하면 URL, 그 외 첫 번째 인자는 site
 * - URL을 주면 YAML startUrls 대신 사용
 */

import { PATH_CONFIG } from "@/config/constants";
import type { ScrapeRunSummary } from "@/core/domain/OverviewCapture";

export interface CliOptions {
  site: string;
  urls: string[];
  json: boolean;
  help: boolean;
}

const URL_PATTERN = /^https?:\/\//i;

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    site: PATH_CONFIG.DEFAULT_SITE,
    urls: [],
    json: false,
    help: false,
  };
  let siteSet = false;

  for (const arg of argv) {
    if (arg === "--json") {
      options.json = true;
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (URL_PATTERN.test(arg)) {
      options.urls.push(arg);
    } else if (!siteSet && !arg.startsWith("-")) {
      options.site = arg;
      siteSet = true;
    } else {
      throw new Error(`알 수 없는 인자: ${arg}`);
    }
  }

  return options;
}

/**
 * 종료 코드
 * - 1: 실제 스크래핑한 URL이 모두 치명적 실패
 * - 0: 그 외 (스킵은 처리 대상에서 제외)
 */
export function resolveExitCode(summary: ScrapeRunSummary): number {
  const processed = summary.items.length + summary.failed.length;
  return processed > 0 && summary.failed.length === processed ? 1 : 0;
}

export const USAGE = `사용법: scrape-overview [site] [url ...] [--json]

  site    config/sites/{site}.yaml (기본: ${PATH_CONFIG.DEFAULT_SITE})
  url     YAML startUrls 대신 스크래핑할 URL
  --json  실행 요약을 stdout에 JSON으로 출력`;
