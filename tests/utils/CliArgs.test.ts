/**
 * CliArgs 단위 테스트
 */

import { describe, it, expect } from "@jest/globals";
import { parseCliArgs, resolveExitCode } from "@/utils/CliArgs";
import type { ScrapeRunSummary } from "@/core/domain/OverviewCapture";

const emptySummary = (): ScrapeRunSummary => ({
  site: "test-shop",
  items: [],
  skipped: [],
  failed: [],
});

describe("parseCliArgs", () => {
  it("인자 없으면 기본 사이트", () => {
    expect(parseCliArgs([])).toEqual({
      site: "unicorn",
      urls: [],
      json: false,
      help: false,
    });
  });

  it("site, URL, --json 조합", () => {
    expect(
      parseCliArgs([
        "acme",
        "https://shop.example.com/p/1",
        "HTTP://shop.example.com/p/2",
        "--json",
      ]),
    ).toEqual({
      site: "acme",
      urls: ["https://shop.example.com/p/1", "HTTP://shop.example.com/p/2"],
      json: true,
      help: false,
    });
  });

  it("URL만 주면 기본 사이트 유지", () => {
    const options = parseCliArgs(["https://shop.example.com/p/1"]);

    expect(options.site).toBe("unicorn");
    expect(options.urls).toEqual(["https://shop.example.com/p/1"]);
  });

  it("-h / --help", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true);
    expect(parseCliArgs(["--help"]).help).toBe(true);
  });

  it("두 번째 site 인자나 알 수 없는 옵션은 에러", () => {
    expect(() => parseCliArgs(["acme", "other"])).toThrow(
      "알 수 없는 인자: other",
    );
    expect(() => parseCliArgs(["--verbose"])).toThrow(
      "알 수 없는 인자: --verbose",
    );
  });
});

describe("resolveExitCode", () => {
  it("처리 대상이 없으면 0", () => {
    expect(resolveExitCode(emptySummary())).toBe(0);
  });

  it("모두 실패하면 1", () => {
    const summary = emptySummary();
    summary.failed.push({ url: "https://shop.example.com/p/1", error: "boom" });

    expect(resolveExitCode(summary)).toBe(1);
  });

  it("일부 성공이면 0", () => {
    const summary = emptySummary();
    summary.failed.push({ url: "https://shop.example.com/p/1", error: "boom" });
    summary.items.push({
      url: "https://shop.example.com/p/2",
      file: "overview/2_1.html",
      source: "dom",
      bytes: 10,
    });

    expect(resolveExitCode(summary)).toBe(0);
  });

  it("스킵을 제외한 처리 대상이 모두 실패하면 1", () => {
    const summary = emptySummary();
    summary.skipped.push({ url: "https://other.test/p/1", reason: "offsite" });
    summary.failed.push({
      url: "https://shop.example.com/p/1",
      error: "launch failed",
    });

    expect(resolveExitCode(summary)).toBe(1);
  });

  it("스킵만 있으면 0", () => {
    const summary = emptySummary();
    summary.skipped.push({ url: "https://other.test/p/1", reason: "offsite" });

    expect(resolveExitCode(summary)).toBe(0);
  });
});
