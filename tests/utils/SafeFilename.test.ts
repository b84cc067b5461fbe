/**
 * SafeFilename 단위 테스트
 */

import { describe, it, expect } from "@jest/globals";
import { extractSlug, makeSafeFilename } from "@/utils/SafeFilename";

describe("extractSlug", () => {
  it("path 마지막 segment를 slug로 사용", () => {
    expect(
      extractSlug("https://shop.unicornstore.in/product/iphone-15-black-128-gb"),
    ).toBe("iphone-15-black-128-gb");
  });

  it("query/fragment는 무시", () => {
    expect(
      extractSlug("https://shop.example.com/product/abc?ref=home#top"),
    ).toBe("abc");
  });

  it("끝의 슬래시는 무시", () => {
    expect(extractSlug("https://shop.example.com/product/abc/")).toBe("abc");
  });

  it("허용되지 않는 문자 연속 구간을 '_' 하나로 치환 후 앞뒤 '_' 제거", () => {
    expect(extractSlug("https://x.com/p/Caf%C3%A9 Latte!!")).toBe(
      "Caf_C3_A9_20Latte",
    );
  });

  it("정리 후 비면 fallback slug", () => {
    expect(extractSlug("https://x.com/p/!!!")).toBe("product");
    expect(extractSlug("https://shop.example.com/")).toBe("product");
    expect(extractSlug("https://shop.example.com/", "item")).toBe("item");
  });

  it("절대 URL이 아니면 문자열을 path로 취급", () => {
    expect(extractSlug("foo/bar baz?x")).toBe("bar_baz");
    expect(extractSlug("")).toBe("product");
  });
});

describe("makeSafeFilename", () => {
  it("{slug}_{unix초}.html 형식", () => {
    expect(
      makeSafeFilename(
        "https://shop.unicornstore.in/product/iphone-15-black-128-gb",
        { nowMs: 1700000000999 },
      ),
    ).toBe("iphone-15-black-128-gb_1700000000.html");
  });

  it("URL 경로의 공백은 %20으로 인코딩된 뒤 정리", () => {
    expect(
      makeSafeFilename("https://shop.example.com/product/a b", {
        nowMs: 1700000000123,
      }),
    ).toBe("a_20b_1700000000.html");
  });

  it("fallback slug 옵션 적용", () => {
    expect(
      makeSafeFilename("https://shop.example.com/", {
        fallbackSlug: "item",
        nowMs: 1234,
      }),
    ).toBe("item_1.html");
  });
});
