/**
 * 출력 파일명 생성 유틸리티
 *
 * 형식: {slug}_{unix초}.html
 * - slug: URL path의 마지막 non-empty segment
 * - [0-9a-zA-Z_-] 이외 문자 연속 구간 → "_" 하나
 * - 앞뒤 "_" 제거, 비면 fallback slug
 */

import { OUTPUT_CONFIG } from "@/config/constants";
import { getUnixSeconds } from "@/utils/timestamp";

const UNSAFE_CHARS = /[^0-9a-zA-Z_-]+/g;

export interface SafeFilenameOptions {
  /** slug를 얻지 못했을 때 이름 (기본: "product") */
  fallbackSlug?: string;
  /** 기준 시각 (ms, 기본: Date.now()) */
  nowMs?: number;
}

/**
 * URL → 안전한 slug
 *
 * @example
 * extractSlug("https://shop.example.com/product/iphone-15-black-128-gb")
 * // "iphone-15-black-128-gb"
 */
export function extractSlug(
  url: string,
  fallbackSlug: string = OUTPUT_CONFIG.FALLBACK_SLUG,
): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    // 절대 URL이 아니면 query/fragment 앞까지를 path로 취급
    pathname = url.split(/[?#]/)[0];
  }

  const segments = pathname.split("/").filter((seg) => seg.length > 0);
  const rawSlug = segments.length > 0 ? segments[segments.length - 1] : "";

  const safe = rawSlug.replace(UNSAFE_CHARS, "_").replace(/^_+|_+$/g, "");
  return safe || fallbackSlug;
}

/**
 * URL → 출력 파일명
 *
 * @example
 * makeSafeFilename("https://shop.example.com/product/a b", { nowMs: 1700000000123 })
 * // "a_20b_1700000000.html" (URL 파싱 시 공백은 %20)
 */
export function makeSafeFilename(
  url: string,
  options: SafeFilenameOptions = {},
): string {
  const slug = extractSlug(url, options.fallbackSlug);
  const ts = getUnixSeconds(options.nowMs);
  return `${slug}_${ts}${OUTPUT_CONFIG.EXTENSION}`;
}
