/**
 * Browser Launch Arguments
 *
 * 목적:
 * - Chrome 플래그 중복 제거
 * - 카테고리별 플래그 조합 가능
 *
 * Chromium 계열 전용 (firefox/webkit에는 전달하지 않음)
 */

export const BROWSER_ARGS = {
  /**
   * 메모리 최적화 플래그
   */
  MEMORY_OPTIMIZED: [
    "--disable-dev-shm-usage", // /dev/shm 사용 최소화
    "--disable-gpu",
    "--disable-extensions",
    "--disable-background-networking",
    "--no-first-run",
  ],

  /**
   * Stealth 플래그 (자동화 제어 표시 제거)
   */
  STEALTH: ["--disable-blink-features=AutomationControlled"],

  /**
   * Sandbox 플래그 (Docker 환경에서 필수)
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  /**
   * 기본 조합 (Docker + Memory + Stealth)
   */
  get DEFAULT(): string[] {
    return [...this.SANDBOX, ...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },

  /**
   * 로컬 개발 조합 (Memory + Stealth)
   */
  get LOCAL_DEV(): string[] {
    return [...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },
} as const;

/**
 * 실행 환경에 맞는 기본 인자 선택
 * - 컨테이너(또는 production): DEFAULT
 * - 로컬: LOCAL_DEV
 */
export function resolveDefaultBrowserArgs(
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const inContainer =
    env.NODE_ENV === "production" || env.RUNNING_IN_DOCKER === "true";
  return inContainer ? BROWSER_ARGS.DEFAULT : BROWSER_ARGS.LOCAL_DEV;
}
