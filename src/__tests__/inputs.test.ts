import { getActionInputs, parseBoolean, parseStrategy } from "../inputs.js";
import { MemoryLogger, setLogger } from "../logger.js";

let logger: MemoryLogger;

beforeEach(() => {
  logger = new MemoryLogger();
  setLogger(logger);
});

describe("parseStrategy", () => {
  it("defaults to auto", () => {
    expect(parseStrategy(undefined)).toBe("auto");
    expect(parseStrategy("  ")).toBe("auto");
  });

  it("accepts known strategies in any case", () => {
    expect(parseStrategy("flat")).toBe("flat");
    expect(parseStrategy(" Nested ")).toBe("nested");
  });

  it("warns and falls back for unknown strategies", () => {
    expect(parseStrategy("fuzzy")).toBe("auto");
    expect(logger.messages("warning")).toEqual([
      'Unknown strategy "fuzzy", using "auto" (expected one of: auto, nested, flat)',
    ]);
  });
});

describe("parseBoolean", () => {
  it("reads common spellings", () => {
    expect(parseBoolean("true", false)).toBe(true);
    expect(parseBoolean("YES", false)).toBe(true);
    expect(parseBoolean("0", true)).toBe(false);
    expect(parseBoolean("off", true)).toBe(false);
  });

  it("uses the default for empty input without warning", () => {
    expect(parseBoolean("", true)).toBe(true);
    expect(logger.messages("warning")).toEqual([]);
  });

  it("warns on anything else", () => {
    expect(parseBoolean("maybe", false)).toBe(false);
    expect(logger.messages("warning")).toEqual(['Invalid boolean "maybe", using false']);
  });
});

describe("getActionInputs", () => {
  const keys = [
    "INPUT_CURRENT",
    "INPUT_BASELINE",
    "INPUT_STRATEGY",
    "INPUT_OUTPUT_DIR",
    "INPUT_FAIL_ON_DIFFERENCES",
  ];
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of keys) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of keys) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it("reads inputs from the environment", () => {
    process.env.INPUT_CURRENT = "snapshots/current.csv";
    process.env.INPUT_BASELINE = "snapshots/baseline.json";
    process.env.INPUT_STRATEGY = "flat";
    process.env.INPUT_OUTPUT_DIR = "out";
    process.env.INPUT_FAIL_ON_DIFFERENCES = "true";

    expect(getActionInputs()).toEqual({
      currentPath: "snapshots/current.csv",
      baselinePath: "snapshots/baseline.json",
      strategy: "flat",
      outputDir: "out",
      failOnDifferences: true,
    });
  });

  it("applies defaults to optional inputs", () => {
    process.env.INPUT_CURRENT = "a.json";
    process.env.INPUT_BASELINE = "b.json";

    expect(getActionInputs()).toEqual({
      currentPath: "a.json",
      baselinePath: "b.json",
      strategy: "auto",
      outputDir: process.cwd(),
      failOnDifferences: false,
    });
  });

  it("requires both snapshot paths", () => {
    process.env.INPUT_CURRENT = "a.json";
    expect(() => getActionInputs()).toThrow("Input required and not supplied: baseline");
  });
});
