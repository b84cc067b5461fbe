/**
 * allowedDomains 필터 (offsite 요청 차단)
 *
 * - 목록이 비어 있으면 모든 URL 허용
 * - host === domain 또는 host가 "." + domain 으로 끝나면 허용
 * - 파싱 불가 URL은 거부
 */

export function isAllowedDomain(
  url: string,
  allowedDomains: readonly string[],
): boolean {
  if (allowedDomains.length === 0) {
    return true;
  }

  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }

  return allowedDomains.some((domain) => {
    const normalized = domain.toLowerCase().replace(/^\.+/, "");
    return host === normalized || host.endsWith(`.${normalized}`);
  });
}
