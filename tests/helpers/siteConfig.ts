/**
 * 테스트용 SiteConfig 생성 (스키마 기본값 적용)
 */

import { SiteConfigSchema, type SiteConfig } from "@/core/domain/SiteConfig";

export function buildSiteConfig(
  overrides: Record<string, unknown> = {},
): SiteConfig {
  return SiteConfigSchema.parse({
    site: "test-shop",
    allowedDomains: ["shop.example.com"],
    startUrls: ["https://shop.example.com/product/test-item"],
    ...overrides,
  });
}
