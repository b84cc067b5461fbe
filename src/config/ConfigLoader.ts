/**
 * 사이트 YAML 설정 로더
 * Singleton Pattern 적용
 *
 * SOLID 원칙:
 * - SRP: YAML 로드 + 검증만 담당
 * - OCP: 새로운 사이트 추가 시 YAML만 추가
 *
 * 처리 순서: YAML 파싱 → zod 스키마 검증(기본값 채움) → 환경변수 override → 캐시
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import {
  BrowserSettingsSchema,
  SiteConfigSchema,
  type SiteConfig,
} from "@/core/domain/SiteConfig";
import {
  ScrapeError,
  ScrapeErrorType,
  describeError,
} from "@/core/domain/ScrapeError";
import { PATH_CONFIG } from "./constants";
import { logger } from "./logger";

const SITE_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;
const YAML_EXTENSION = ".yaml";

/**
 * Config Loader
 */
export class ConfigLoader {
  private static instance: ConfigLoader;
  private configCache: Map<string, SiteConfig> = new Map();

  constructor(
    private readonly sitesDir: string = PATH_CONFIG.SITES_DIR,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  /**
   * Singleton 인스턴스 반환 (기본 sites 디렉토리)
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * 사이트 설정 로드
   */
  loadConfig(site: string): SiteConfig {
    const cached = this.configCache.get(site);
    if (cached) {
      return cached;
    }

    // 경로 조작 방지 (파일명으로만 사용)
    if (!SITE_ID_PATTERN.test(site)) {
      throw new ScrapeError(
        ScrapeErrorType.CONFIG_NOT_FOUND,
        `Invalid site id: ${site}`,
        { site },
      );
    }

    const configPath = path.join(this.sitesDir, `${site}${YAML_EXTENSION}`);

    if (!fs.existsSync(configPath)) {
      throw new ScrapeError(
        ScrapeErrorType.CONFIG_NOT_FOUND,
        `Config file not found: ${configPath}`,
        { site },
      );
    }

    let raw: unknown;
    try {
      raw = yaml.load(fs.readFileSync(configPath, "utf8"));
    } catch (error) {
      throw new ScrapeError(
        ScrapeErrorType.CONFIG_INVALID,
        `YAML 파싱 실패 (${configPath}): ${describeError(error)}`,
        { site, cause: error },
      );
    }

    const parsed = SiteConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ScrapeError(
        ScrapeErrorType.CONFIG_INVALID,
        `Invalid site config (${site}): ${issues}`,
        { site, cause: parsed.error },
      );
    }

    const config = applyEnvOverrides(parsed.data, this.env);
    this.configCache.set(site, config);

    logger.debug(
      { site, configPath, startUrls: config.startUrls.length },
      "사이트 설정 로드 완료",
    );

    return config;
  }

  /**
   * 사용 가능한 사이트 목록 반환
   */
  getAvailableSites(): string[] {
    if (!fs.existsSync(this.sitesDir)) {
      throw new ScrapeError(
        ScrapeErrorType.CONFIG_NOT_FOUND,
        `Sites directory not found: ${this.sitesDir}`,
      );
    }

    return fs
      .readdirSync(this.sitesDir)
      .filter((file) => file.endsWith(YAML_EXTENSION))
      .map((file) => file.slice(0, -YAML_EXTENSION.length))
      .sort();
  }

  /**
   * 캐시 클리어 (테스트용)
   */
  clearCache(): void {
    this.configCache.clear();
  }
}

/**
 * 환경변수 override 적용
 *
 * - OVERVIEW_OUTPUT_DIR: output.dir
 * - HEADLESS: browser.headless ("true" | "false")
 * - BROWSER_TYPE: browser.browserType
 * - NAVIGATION_TIMEOUT_MS: browser.navigationTimeout
 *
 * 잘못된 값은 경고 후 무시
 */
export function applyEnvOverrides(
  config: SiteConfig,
  env: NodeJS.ProcessEnv,
): SiteConfig {
  const browser = { ...config.browser };
  const output = { ...config.output };

  if (env.OVERVIEW_OUTPUT_DIR) {
    output.dir = env.OVERVIEW_OUTPUT_DIR;
  }

  if (env.HEADLESS !== undefined) {
    if (env.HEADLESS === "true" || env.HEADLESS === "false") {
      browser.headless = env.HEADLESS === "true";
    } else {
      logger.warn({ value: env.HEADLESS }, "HEADLESS 값 무시 (true/false)");
    }
  }

  if (env.BROWSER_TYPE !== undefined) {
    const browserType = BrowserSettingsSchema.shape.browserType.safeParse(
      env.BROWSER_TYPE,
    );
    if (browserType.success) {
      browser.browserType = browserType.data;
    } else {
      logger.warn({ value: env.BROWSER_TYPE }, "BROWSER_TYPE 값 무시");
    }
  }

  if (env.NAVIGATION_TIMEOUT_MS !== undefined) {
    const timeout = Number(env.NAVIGATION_TIMEOUT_MS);
    if (Number.isInteger(timeout) && timeout > 0) {
      browser.navigationTimeout = timeout;
    } else {
      logger.warn(
        { value: env.NAVIGATION_TIMEOUT_MS },
        "NAVIGATION_TIMEOUT_MS 값 무시",
      );
    }
  }

  return { ...config, browser, output };
}
