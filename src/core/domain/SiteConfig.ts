/**
 * SiteConfig - 사이트 YAML 설정 스키마
 *
 * config/sites/{site}.yaml 구조 정의
 * 기본값은 스키마에서 관리 (YAML에는 사이트별 차이만 기술)
 */

import { z } from "zod";
import { OUTPUT_CONFIG, SCRAPER_CONFIG } from "@/config/constants";

/**
 * Overview 전략 ID
 * 배열 순서 = 실행 우선순위
 */
export const OverviewStrategyIdSchema = z.enum(["network", "dom", "full_page"]);

export type OverviewStrategyId = z.infer<typeof OverviewStrategyIdSchema>;

/**
 * 네비게이션 이후 실행할 스텝
 */
export const NavigationStepSchema = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("waitForSelector"),
    selector: z.string().min(1),
    timeout: z.number().int().positive().optional(),
    description: z.string().optional(),
  }),
  z.object({
    action: z.literal("wait"),
    duration: z.number().int().nonnegative(),
    description: z.string().optional(),
  }),
]);

export type NavigationStep = z.infer<typeof NavigationStepSchema>;

/**
 * 브라우저 설정
 */
export const BrowserSettingsSchema = z.object({
  browserType: z.enum(["chromium", "firefox", "webkit"]).default("chromium"),
  headless: z.boolean().default(true),
  navigationTimeout: z
    .number()
    .int()
    .positive()
    .default(SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS),
  waitUntil: z
    .enum(["load", "domcontentloaded", "networkidle", "commit"])
    .default("load"),
  args: z.array(z.string()).optional(),
  userAgent: z.string().optional(),
  viewport: z
    .object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    })
    .optional(),
  locale: z.string().optional(),
});

export type BrowserSettings = z.infer<typeof BrowserSettingsSchema>;

/**
 * Overview 후보 응답 판별 규칙
 * (URL 키워드 OR URL 접미사 OR Content-Type, 모두 소문자 비교)
 */
export const ResponseMatchRulesSchema = z.object({
  urlKeywords: z.array(z.string()).default(["overview"]),
  urlSuffixes: z.array(z.string()).default([".html"]),
  contentTypes: z.array(z.string()).default(["text/html"]),
});

export type ResponseMatchRules = z.infer<typeof ResponseMatchRulesSchema>;

export const DEFAULT_TAB_SELECTORS = [
  "text=Overview",
  "span.p-tabview-title:has-text('Overview')",
];

export const DEFAULT_DOM_SELECTORS = [
  "div.p-tabview-panels div.p-tabview-panel.p-tabview-panel-active",
  "div.p-tabview-panels",
  "section#overview",
  "div.overview",
  "div#overview",
];

/**
 * Overview 추출 설정
 */
export const OverviewSettingsSchema = z.object({
  strategies: z
    .array(OverviewStrategyIdSchema)
    .min(1)
    .default(["network", "dom", "full_page"])
    .refine((ids) => new Set(ids).size === ids.length, {
      message: "Duplicate overview strategy IDs found",
    }),
  tabSelectors: z.array(z.string().min(1)).default(DEFAULT_TAB_SELECTORS),
  clickTimeout: z
    .number()
    .int()
    .positive()
    .default(SCRAPER_CONFIG.CLICK_TIMEOUT_MS),
  responseWait: z
    .number()
    .int()
    .nonnegative()
    .default(SCRAPER_CONFIG.RESPONSE_WAIT_MS),
  expectResponseTimeout: z
    .number()
    .int()
    .positive()
    .default(SCRAPER_CONFIG.EXPECT_RESPONSE_TIMEOUT_MS),
  responseMatch: ResponseMatchRulesSchema.default({}),
  domSelectors: z.array(z.string().min(1)).default(DEFAULT_DOM_SELECTORS),
});

export type OverviewSettings = z.infer<typeof OverviewSettingsSchema>;

/**
 * 출력 설정
 */
export const OutputSettingsSchema = z.object({
  dir: z.string().min(1).default(OUTPUT_CONFIG.DEFAULT_DIR),
  fallbackSlug: z.string().min(1).default(OUTPUT_CONFIG.FALLBACK_SLUG),
});

export type OutputSettings = z.infer<typeof OutputSettingsSchema>;

/**
 * 사이트 설정 (YAML 루트)
 */
export const SiteConfigSchema = z.object({
  site: z.string().min(1),
  allowedDomains: z.array(z.string().min(1)).default([]),
  startUrls: z.array(z.string().url()).min(1),
  requestDelay: z.number().int().nonnegative().default(0),
  browser: BrowserSettingsSchema.default({}),
  navigationSteps: z.array(NavigationStepSchema).default([]),
  overview: OverviewSettingsSchema.default({}),
  output: OutputSettingsSchema.default({}),
});

export type SiteConfig = z.infer<typeof SiteConfigSchema>;
