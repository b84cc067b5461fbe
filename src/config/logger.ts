/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 콘솔 출력 (logMethod hook)
 *   - LOG_PRETTY=true: 색상 포맷
 *   - 그 외: JSON 포맷
 * - 파일 출력 (LOG_TO_FILE=true 일 때만)
 *   - logs/YYYY-MM-DD/overview-scraper.log
 *   - logs/YYYY-MM-DD/error.log (에러 통합)
 *   - 일일 로테이션, 30일 보관
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, type RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { APP_METADATA } from "@/config/constants";
import {
  getDateStringWithDash,
  getTimestampWithTimezone,
} from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL || (NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = process.env.LOG_TO_FILE === "true";
const LOG_FILE_PREFIX = "overview-scraper";

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      const fullDir = path.join(LOG_DIR, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d", // 일일 로테이션
      intervalBoundary: true, // 자정 기준 정렬
      initialRotation: true,
      immutable: true, // 과거 파일 수정 방지
      path: LOG_DIR,
      maxFiles: 30,
      maxSize: "50M",
    },
  );
}

/**
 * 파일 라우팅 스트림
 * - 모든 로그 → overview-scraper.log
 * - error 이상 → error.log 추가 기록
 * - skip_file_log 플래그가 있는 로그는 파일에 저장하지 않음
 */
class FileRoutingStream implements DestinationStream {
  private readonly mainStream = createRotatingStream(LOG_FILE_PREFIX);
  private readonly errorStream = createRotatingStream("error");

  write(chunk: string): boolean {
    let parsed: unknown;
    try {
      parsed = JSON.parse(chunk);
    } catch {
      // JSON 파싱 실패 시 메인 로그에만 기록
      this.mainStream.write(chunk);
      return true;
    }

    if (typeof parsed === "object" && parsed !== null) {
      if ("skip_file_log" in parsed && parsed.skip_file_log === true) {
        return true;
      }
      if (
        "level" in parsed &&
        (parsed.level === "error" ||
          parsed.level === "fatal" ||
          (typeof parsed.level === "number" && parsed.level >= 50))
      ) {
        this.errorStream.write(chunk);
      }
    }

    this.mainStream.write(chunk);
    return true;
  }
}

/**
 * Pino 로그 레벨 상수
 */
const LOG_LEVELS = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
} as const;

/**
 * 콘솔 출력 기준 레벨 (파일과 동일)
 */
function consoleThreshold(level: string): number {
  switch (level) {
    case "trace":
      return LOG_LEVELS.TRACE;
    case "debug":
      return LOG_LEVELS.DEBUG;
    case "info":
      return LOG_LEVELS.INFO;
    case "warn":
      return LOG_LEVELS.WARN;
    case "error":
      return LOG_LEVELS.ERROR;
    case "fatal":
      return LOG_LEVELS.FATAL;
    default:
      return Number.POSITIVE_INFINITY; // silent
  }
}

const CONSOLE_THRESHOLD = consoleThreshold(LOG_LEVEL);

/**
 * 콘솔 출력 포맷터 타입
 */
type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

/**
 * 개발 환경용 콘솔 포맷터 (색상 + 구조화)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level >= LOG_LEVELS.ERROR
      ? "\x1b[31m"
      : level >= LOG_LEVELS.WARN
        ? "\x1b[33m"
        : level >= LOG_LEVELS.INFO
          ? "\x1b[32m"
          : "\x1b[90m";
  const levelText =
    level >= LOG_LEVELS.ERROR
      ? "ERROR"
      : level >= LOG_LEVELS.WARN
        ? "WARN"
        : level >= LOG_LEVELS.INFO
          ? "INFO"
          : "DEBUG";
  const star = logObj.important === true ? " ⭐" : "";

  if (msg) {
    console.error(
      `[${time}] ${levelColor}${levelText}\x1b[0m${star} \x1b[36m${msg}\x1b[0m`,
    );
  } else {
    console.error(`[${time}] ${levelColor}${levelText}\x1b[0m${star}`);
  }

  // 추가 필드 출력
  const excludedFields = ["msg", "important", "skip_file_log"];
  for (const [field, raw] of Object.entries(logObj)) {
    if (excludedFields.includes(field)) continue;
    const value =
      typeof raw === "object" && raw !== null
        ? JSON.stringify(raw, null, 2)
            .split("\n")
            .map((l) => "  " + l)
            .join("\n")
        : String(raw);
    console.error(`  ${field}: ${value}`);
  }
};

/**
 * 프로덕션 환경용 콘솔 포맷터 (JSON)
 * stdout은 --json 결과 출력용이므로 stderr 사용
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.error(
    JSON.stringify({
      time: getTimestampWithTimezone(),
      level,
      service: APP_METADATA.SERVICE,
      ...logObj,
    }),
  );
};

/**
 * 콘솔 출력에서 제외할 base 필드 (JSON 포맷터가 service를 별도로 기록)
 */
const BASE_FIELDS = ["service", "env"];

/**
 * 콘솔 출력 Hook 생성 함수
 */
function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      // 파일 로그는 정상 처리
      method.apply(this, inputArgs);

      if (level < CONSOLE_THRESHOLD) {
        return;
      }

      // child 바인딩(site, url, strategy) 포함, base 필드는 제외
      const logObj: Record<string, unknown> = {};
      for (const [field, value] of Object.entries(this.bindings())) {
        if (!BASE_FIELDS.includes(field)) {
          logObj[field] = value;
        }
      }

      // Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
      const [first, second]: unknown[] = inputArgs;

      if (typeof first === "string") {
        logObj.msg = first;
      } else if (typeof first === "object" && first !== null) {
        Object.assign(logObj, first);
        if (typeof second === "string") {
          logObj.msg = second;
        }
      }

      formatter(logObj, level);
    },
  };
}

/**
 * 기본 로거 설정
 */
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: APP_METADATA.SERVICE,
    env: NODE_ENV,
  },
};

const streams: pino.StreamEntry[] = [];

if (LOG_TO_FILE) {
  if (!fs.existsSync(LOG_DIR)) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
  }
  streams.push({ level: "debug", stream: new FileRoutingStream() });
}

const hooks = createConsoleHook(
  LOG_PRETTY ? formatConsolePretty : formatConsoleJson,
);

/**
 * 메인 로거 인스턴스
 */
const logger: pino.Logger = pino(
  { ...baseConfig, hooks },
  pino.multistream(streams),
);

export { logger };

export type Logger = pino.Logger;
