/**
 * NetworkOverviewStrategy 단위 테스트
 */

import { describe, it, expect, jest } from "@jest/globals";
import { NetworkOverviewStrategy } from "@/strategies/overview/NetworkOverviewStrategy";
import {
  FakeBrowserController,
  type FakeResponse,
} from "../../helpers/FakeBrowserController";
import { buildCaptureContext } from "../../helpers/captureContext";

const TAB = "text=Overview";
const SPAN_TAB = "span.p-tabview-title:has-text('Overview')";

const htmlResponse = (url: string, body: string): FakeResponse => ({
  url,
  contentType: "text/html; charset=utf-8",
  body,
});

describe("NetworkOverviewStrategy", () => {
  const strategy = new NetworkOverviewStrategy();

  it("id는 network", () => {
    expect(strategy.id).toBe("network");
  });

  it("탭 클릭으로 받은 HTML 응답 캡처", async () => {
    const controller = new FakeBrowserController({
      clickable: [TAB],
      clickResponses: {
        [TAB]: [
          htmlResponse(
            "https://shop.example.com/api/overview/1",
            "<div>overview</div>",
          ),
        ],
      },
    });

    const html = await strategy.capture(buildCaptureContext(controller));

    expect(html).toBe("<div>overview</div>");
    expect(controller.clicks).toEqual([TAB]);
    expect(controller.waits).toEqual([1400]);
    expect(controller.waitForResponseCalls).toBe(0);
    expect(controller.listenerCount).toBe(0);
  });

  it("여러 후보 중 최신 응답 우선", async () => {
    const controller = new FakeBrowserController({
      clickable: [TAB],
      clickResponses: {
        [TAB]: [
          htmlResponse("https://shop.example.com/a.html", "<div>first</div>"),
          htmlResponse("https://shop.example.com/b.html", "<div>second</div>"),
        ],
      },
    });

    await expect(
      strategy.capture(buildCaptureContext(controller)),
    ).resolves.toBe("<div>second</div>");
  });

  it("최신 응답이 비었거나 읽기 실패하면 이전 응답 사용", async () => {
    const controller = new FakeBrowserController({
      clickable: [TAB],
      clickResponses: {
        [TAB]: [
          htmlResponse("https://shop.example.com/a.html", "<div>old</div>"),
          htmlResponse("https://shop.example.com/b.html", ""),
          {
            url: "https://shop.example.com/c.html",
            contentType: "text/html",
            unreadable: true,
          },
        ],
      },
    });

    await expect(
      strategy.capture(buildCaptureContext(controller)),
    ).resolves.toBe("<div>old</div>");
  });

  it("후보가 아닌 응답은 무시하고 응답 대기로 넘어감", async () => {
    const controller = new FakeBrowserController({
      clickable: [TAB],
      clickResponses: {
        [TAB]: [
          {
            url: "https://shop.example.com/static/app.js",
            contentType: "application/javascript",
            body: "console.log(1)",
          },
        ],
      },
    });

    const html = await strategy.capture(buildCaptureContext(controller));

    expect(html).toBeNull();
    expect(controller.waitForResponseCalls).toBe(1);
    expect(controller.listenerCount).toBe(0);
  });

  it("첫 selector 클릭 실패 시 다음 selector 시도", async () => {
    const controller = new FakeBrowserController({
      clickable: [SPAN_TAB],
      clickResponses: {
        [SPAN_TAB]: [
          htmlResponse("https://shop.example.com/overview", "<div>span</div>"),
        ],
      },
    });

    const html = await strategy.capture(buildCaptureContext(controller));

    expect(html).toBe("<div>span</div>");
    expect(controller.clicks).toEqual([TAB, SPAN_TAB]);
  });

  it("클릭 모두 실패 시 첫 selector 재클릭을 trigger로 응답 대기", async () => {
    const controller = new FakeBrowserController({
      lateResponses: [
        htmlResponse("https://shop.example.com/overview", "<div>late</div>"),
      ],
    });

    const html = await strategy.capture(buildCaptureContext(controller));

    expect(html).toBe("<div>late</div>");
    expect(controller.clicks).toEqual([TAB, SPAN_TAB, TAB]);
    expect(controller.waitForResponseCalls).toBe(1);
  });

  it("클릭 성공 후 응답 대기에서는 다시 클릭하지 않음", async () => {
    const controller = new FakeBrowserController({
      clickable: [TAB],
      lateResponses: [
        htmlResponse("https://shop.example.com/overview", "<div>late</div>"),
      ],
    });

    const html = await strategy.capture(buildCaptureContext(controller));

    expect(html).toBe("<div>late</div>");
    expect(controller.clicks).toEqual([TAB]);
  });

  it("사이트 설정의 selector/대기시간 사용", async () => {
    const controller = new FakeBrowserController();

    const html = await strategy.capture(
      buildCaptureContext(controller, {
        tabSelectors: ["#tab-description"],
        responseWait: 50,
      }),
    );

    expect(html).toBeNull();
    expect(controller.clicks).toEqual([
      "#tab-description",
      "#tab-description",
    ]);
    expect(controller.waits).toEqual([50]);
  });

  it("예외가 나도 리스너 해제", async () => {
    const controller = new FakeBrowserController({ clickable: [TAB] });
    jest
      .spyOn(controller, "waitForTimeout")
      .mockRejectedValue(new Error("Target closed"));

    await expect(
      strategy.capture(buildCaptureContext(controller)),
    ).rejects.toThrow("Target closed");
    expect(controller.listenerCount).toBe(0);
  });
});
