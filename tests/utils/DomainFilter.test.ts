/**
 * DomainFilter 단위 테스트
 */

import { describe, it, expect } from "@jest/globals";
import { isAllowedDomain } from "@/utils/DomainFilter";

describe("isAllowedDomain", () => {
  const allowed = ["shop.example.com"];

  it("목록이 비어 있으면 모두 허용", () => {
    expect(isAllowedDomain("https://anything.test/p/1", [])).toBe(true);
    expect(isAllowedDomain("not a url", [])).toBe(true);
  });

  it("호스트 일치 허용", () => {
    expect(isAllowedDomain("https://shop.example.com/product/a", allowed)).toBe(true);
    expect(isAllowedDomain("https://SHOP.Example.com/product/a", allowed)).toBe(true);
  });

  it("하위 도메인 허용", () => {
    expect(isAllowedDomain("https://m.shop.example.com/product/a", allowed)).toBe(true);
  });

  it("접미사만 같은 다른 호스트는 거부", () => {
    expect(isAllowedDomain("https://evilshop.example.com/product/a", allowed)).toBe(false);
    expect(isAllowedDomain("https://example.com/product/a", allowed)).toBe(false);
  });

  it("앞쪽 '.'은 무시", () => {
    expect(isAllowedDomain("https://www.example.com/", [".example.com"])).toBe(true);
    expect(isAllowedDomain("https://example.com/", [".example.com"])).toBe(true);
  });

  it("파싱 불가 URL은 거부", () => {
    expect(isAllowedDomain("shop.example.com/product/a", allowed)).toBe(false);
  });
});
