import { describe, it, expect } from "@jest/globals";
import { CommanderError } from "commander";
import {
  CliUsageError,
  createCliProgram,
  parseCliArgs,
  toCliJobParameters,
} from "@/cli/CliOptions";

/**
 * 종료 / stderr 출력 없이 에러를 던지는 프로그램
 */
function quietProgram() {
  return createCliProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
}

describe("parseCliArgs()", () => {
  it("옵션을 파싱하고 기본값을 채워야 함", () => {
    const options = parseCliArgs(["-k", "serum", "-b", "Wardah", "--output-dir", "/tmp/out"], quietProgram());

    expect(options).toEqual({
      keyword: "serum",
      brand: "Wardah",
      maxProducts: undefined,
      maxPages: undefined,
      delay: 1,
      strategy: "auto",
      outputDir: "/tmp/out",
    });
  });

  it("--pages는 --max-pages 별칭이어야 함", () => {
    const options = parseCliArgs(["-k", "serum", "-b", "Wardah", "--pages", "3"], quietProgram());

    expect(options.maxPages).toBe(3);
  });

  it("--max-pages가 --pages보다 우선해야 함", () => {
    const options = parseCliArgs(
      ["-k", "serum", "-b", "Wardah", "--pages", "3", "--max-pages", "5"],
      quietProgram(),
    );

    expect(options.maxPages).toBe(5);
  });

  it("숫자 옵션을 변환해야 함", () => {
    const options = parseCliArgs(
      ["-k", "serum", "-b", "Wardah", "--max-products", "120", "--delay", "0.5", "--strategy", "graphql"],
      quietProgram(),
    );

    expect(options).toMatchObject({ maxProducts: 120, delay: 0.5, strategy: "graphql" });
  });

  it("브랜드가 없으면 CommanderError를 던져야 함", () => {
    expect(() => parseCliArgs(["-k", "serum"], quietProgram())).toThrow(CommanderError);
  });

  it("빈 키워드나 잘못된 값은 CliUsageError여야 함", () => {
    expect(() => parseCliArgs(["-k", " ", "-b", "Wardah"], quietProgram())).toThrow(
      "keyword: keyword is required",
    );
    expect(() =>
      parseCliArgs(["-k", "serum", "-b", "Wardah", "--max-products", "0"], quietProgram()),
    ).toThrow(CliUsageError);
    expect(() =>
      parseCliArgs(["-k", "serum", "-b", "Wardah", "--strategy", "api"], quietProgram()),
    ).toThrow(CliUsageError);
  });
});

describe("toCliJobParameters()", () => {
  it("초 단위 지연을 ms로 변환해야 함", () => {
    const options = parseCliArgs(
      ["-k", "serum", "-b", "Wardah", "--max-products", "50", "--delay", "1.5"],
      quietProgram(),
    );

    expect(toCliJobParameters(options)).toEqual({
      query: "serum",
      brand: "Wardah",
      max_products: 50,
      max_pages: null,
      output_format: "json",
      delay_ms: 1500,
      strategy: "auto",
    });
  });
});
