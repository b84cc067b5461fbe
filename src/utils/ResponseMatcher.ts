/**
 * Overview 후보 응답 판별
 *
 * 다음 중 하나라도 만족하면 후보 (모두 소문자 비교):
 * - URL에 키워드 포함 (예: "overview")
 * - URL이 접미사로 끝남 (예: ".html")
 * - content-type에 값 포함 (예: "text/html")
 */

import type { ResponseMatchRules } from "@/core/domain/SiteConfig";

export interface ResponseLike {
  url?: string | null;
  contentType?: string | null;
}

export function isOverviewCandidate(
  response: ResponseLike,
  rules: ResponseMatchRules,
): boolean {
  const url = (response.url ?? "").toLowerCase();
  const contentType = (response.contentType ?? "").toLowerCase();

  return (
    rules.urlKeywords.some((k) => url.includes(k.toLowerCase())) ||
    rules.urlSuffixes.some((s) => url.endsWith(s.toLowerCase())) ||
    rules.contentTypes.some((t) => contentType.includes(t.toLowerCase()))
  );
}
