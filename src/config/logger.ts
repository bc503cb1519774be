/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 다중 출력 (콘솔 + 파일)
 * - 서비스별 로그 파일 분리 (SERVICE_NAME: server, cli)
 * - 일일 로그 로테이션
 * - 구조화된 JSON 로깅
 *
 * 파일 출력 (날짜별 디렉터리):
 * - logs/YYYY-MM-DD/server.log (API 서버)
 * - logs/YYYY-MM-DD/cli.log (CLI 실행)
 * - logs/YYYY-MM-DD/error.log (에러 통합)
 *
 * NODE_ENV=test 에서는 파일 출력 없이 silent
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, type RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getDateStringWithDash, getTimestampWithTimezone } from "@/utils/timestamp";

const NODE_ENV = process.env.NODE_ENV || "development";
const IS_TEST = NODE_ENV === "test";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (IS_TEST ? "silent" : NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = process.env.LOG_TO_FILE !== "false" && !IS_TEST;
const SERVICE_NAME = process.env.SERVICE_NAME || "server";

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      fs.mkdirSync(path.join(LOG_DIR, dateDir), { recursive: true });
      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      immutable: true,
      path: LOG_DIR,
      maxFiles: 30,
      maxSize: "100M",
    },
  );
}

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "tokopedia_scraper",
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
};

/**
 * 서비스별 라우팅 스트림
 * skip_file_log 플래그가 있는 로그는 파일에 저장하지 않음
 */
class ServiceRoutingStream implements DestinationStream {
  private readonly streams = new Map<string, RotatingFileStream>();
  private readonly errorStream = createRotatingStream("error");

  private getStream(serviceName: string): RotatingFileStream {
    const existing = this.streams.get(serviceName);
    if (existing) {
      return existing;
    }
    const stream = createRotatingStream(serviceName);
    this.streams.set(serviceName, stream);
    return stream;
  }

  write(chunk: string): boolean {
    let serviceName = SERVICE_NAME;
    try {
      const log: unknown = JSON.parse(chunk);
      if (typeof log === "object" && log !== null) {
        if ("skip_file_log" in log && log.skip_file_log === true) {
          return true;
        }
        if ("level" in log && log.level === "error") {
          this.errorStream.write(chunk);
        }
        if ("service_name" in log && typeof log.service_name === "string") {
          serviceName = log.service_name;
        }
      }
    } catch {
      // JSON이 아니면 기본 서비스 파일로
    }
    this.getStream(serviceName).write(chunk);
    return true;
  }
}

const LOG_LEVELS = {
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
} as const;

type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

const CONSOLE_EXCLUDED_FIELDS = new Set([
  "level",
  "time",
  "service",
  "env",
  "pid",
  "hostname",
  "msg",
  "important",
  "skip_file_log",
]);

/**
 * 개발 환경용 콘솔 포맷터 (색상)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const [levelColor, levelText] =
    level >= LOG_LEVELS.ERROR
      ? ["\x1b[31m", "ERROR"]
      : level >= LOG_LEVELS.WARN
        ? ["\x1b[33m", "WARN"]
        : level >= LOG_LEVELS.INFO
          ? ["\x1b[32m", "INFO"]
          : ["\x1b[90m", "DEBUG"];
  const star = logObj.important === true ? " ⭐" : "";

  console.error(`[${time}] ${levelColor}${levelText}\x1b[0m${star} \x1b[36m${msg}\x1b[0m`);

  for (const [field, raw] of Object.entries(logObj)) {
    if (CONSOLE_EXCLUDED_FIELDS.has(field)) continue;
    const value =
      typeof raw === "object" && raw !== null
        ? JSON.stringify(raw, null, 2)
            .split("\n")
            .map((line) => "  " + line)
            .join("\n")
        : String(raw);
    console.error(`  ${field}: ${value}`);
  }
};

const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.log(JSON.stringify({ ...logObj, level }));
};

/**
 * 콘솔 출력 Hook
 * logger.info(obj, msg) / logger.info(msg) 두 형식 모두 처리
 */
function createConsoleHook(formatter: ConsoleFormatter): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      if (IS_TEST) {
        return;
      }

      const [first, second] = inputArgs;
      const logObj: Record<string, unknown> = {};
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

const hooks = createConsoleHook(
  NODE_ENV === "development" && LOG_PRETTY ? formatConsolePretty : formatConsoleJson,
);

/**
 * 파일 출력 비활성화 시 사용 (콘솔 Hook만 동작)
 */
class NullStream implements DestinationStream {
  write(): boolean {
    return true;
  }
}

const logger: pino.Logger = pino(
  { ...baseConfig, hooks },
  LOG_TO_FILE ? new ServiceRoutingStream() : new NullStream(),
);

export { logger };

export type Logger = pino.Logger;
