#!/usr/bin/env node
/**
 * 상품 Overview 스크래퍼 CLI
 *
 * 사용법:
 *   npx tsx src/scrape-overview.ts
 *   npx tsx src/scrape-overview.ts unicorn https://shop.unicornstore.in/product/iphone-15-black-128-gb --json
 */

import "dotenv/config";
import { ConfigLoader } from "@/config/ConfigLoader";
import { logger } from "@/config/logger";
import { ScrapeError, describeError } from "@/core/domain/ScrapeError";
import { OverviewScrapeService } from "@/services/OverviewScrapeService";
import { USAGE, parseCliArgs, resolveExitCode } from "@/utils/CliArgs";

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = ConfigLoader.getInstance().loadConfig(options.site);
  const service = new OverviewScrapeService(config);

  const summary = await service.run(
    options.urls.length > 0 ? options.urls : config.startUrls,
  );

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
  }

  return resolveExitCode(summary);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const details =
      error instanceof ScrapeError
        ? error.toLogObject()
        : { error: describeError(error) };
    logger.fatal(details, "Overview 스크래퍼 실행 실패");
    process.exitCode = 1;
  });
