/**
 * LoggerContext 단위 테스트
 */

import { describe, it, expect } from "@jest/globals";
import pino from "pino";
import {
  createStrategyLogger,
  createUrlLogger,
  logImportant,
} from "@/utils/LoggerContext";

function captureLogger(): { target: pino.Logger; lines: string[] } {
  const lines: string[] = [];
  const target = pino(
    { level: "info", base: null, timestamp: false },
    {
      write: (line: string) => {
        lines.push(line);
      },
    },
  );
  return { target, lines };
}

describe("LoggerContext", () => {
  it("URL/전략 컨텍스트가 로그에 포함", () => {
    const { target, lines } = captureLogger();

    const strategyLogger = createStrategyLogger(
      createUrlLogger(target, "https://shop.example.com/product/a"),
      "network",
    );
    strategyLogger.info("captured");

    expect(JSON.parse(lines[0])).toEqual({
      level: 30,
      url: "https://shop.example.com/product/a",
      strategy: "network",
      msg: "captured",
    });
  });

  it("logImportant는 important 플래그 추가", () => {
    const { target, lines } = captureLogger();

    logImportant(target, "saved", { bytes: 10 });

    expect(JSON.parse(lines[0])).toEqual({
      level: 30,
      bytes: 10,
      important: true,
      msg: "saved",
    });
  });
});
